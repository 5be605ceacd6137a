import type { ReportSyncProgressUseCase } from '@csp/monitor/application/use-cases/report-sync-progress/report-sync-progress.usecase';
import {
  buildMonitorModules,
  type ModuleOverrides,
  type MonitorModules,
} from '@csp/monitor/infrastructure/di/module-registry';
import { type ConfigSchema, loadConfig } from '@csp/config';
import type { ClockPort, NotificationPort } from '@csp/domain';

export interface SyncMonitorOptions {
  config?: ConfigSchema;
  overrides?: ModuleOverrides;
}

export abstract class SyncMonitor {
  protected readonly config: ConfigSchema;
  protected readonly modules: MonitorModules;

  constructor(options: SyncMonitorOptions = {}) {
    this.config = options.config ?? loadConfig().config;
    this.modules = buildMonitorModules(this.config, options.overrides);
  }

  // ============================================================================
  // Core Infrastructure
  // ============================================================================

  protected getClock(): ClockPort {
    return this.modules.clock;
  }

  protected getNotificationPort(): NotificationPort {
    return this.modules.notificationPort;
  }

  // ============================================================================
  // Use Cases
  // ============================================================================

  protected getReportSyncProgress(): ReportSyncProgressUseCase {
    return this.modules.reportSyncProgress;
  }
}
