import {
  type HistorySource,
  ReportSyncProgressUseCase,
} from '@csp/monitor/application/use-cases/report-sync-progress/report-sync-progress.usecase';
import type { NodeTipPort } from '@csp/monitor/domain/services/ports/node-tip.port';
import { SolanaNodeAdapter } from '@csp/monitor/infrastructure/adapters/blockchain/solana-node.adapter';
import { EpochScheduleHistoryAdapter } from '@csp/monitor/infrastructure/adapters/history/epoch-schedule-history.adapter';
import { ConsoleNotifierAdapter } from '@csp/monitor/infrastructure/adapters/notification/console-notifier.adapter';
import { DiscordNotifierAdapter } from '@csp/monitor/infrastructure/adapters/notification/discord-notifier.adapter';
import { MultiNotifierAdapter } from '@csp/monitor/infrastructure/adapters/notification/multi-notifier.adapter';
import { createChildLogger } from '@csp/monitor/infrastructure/logging/pino-logger';
import type { ChainConfig, ConfigSchema } from '@csp/config';
import {
  asyncEffect,
  type ClockPort,
  createDefaultClock,
  liftToAsync,
  loggerTracer,
  type NotificationPort,
  StartTime,
  Summary,
  SyncTolerance,
  syncEffect,
  TimeInterpreter,
} from '@csp/domain';
import { Connection } from '@solana/web3.js';

export interface MonitorModules {
  readonly clock: ClockPort;
  readonly notificationPort: NotificationPort;
  readonly reportSyncProgress: ReportSyncProgressUseCase;
}

export interface ModuleOverrides {
  readonly clock?: ClockPort;
  readonly node?: NodeTipPort;
  readonly notificationPort?: NotificationPort;
}

function buildNotificationPort(config: ConfigSchema): NotificationPort {
  const consoleNotifier = new ConsoleNotifierAdapter();
  const webhookUrl = config.telemetry.discordWebhookUrl;
  return webhookUrl
    ? new MultiNotifierAdapter([consoleNotifier, new DiscordNotifierAdapter(webhookUrl)])
    : consoleNotifier;
}

function buildTimeInterpreter(
  chain: ChainConfig,
  node: NodeTipPort,
  rpcTimeoutMs: number,
): { timeInterpreter: TimeInterpreter<'async'>; history: EpochScheduleHistoryAdapter | null } {
  const startTime = StartTime.fromIso(chain.startTime);
  const logger = createChildLogger('time-interpreter');

  if (chain.history.source === 'static') {
    const summary = Summary.fromEras(chain.history.eras);
    const timeInterpreter = TimeInterpreter.fromSummary(summary, startTime, loggerTracer(logger, syncEffect), syncEffect).hoist(
      liftToAsync,
      asyncEffect,
    );
    return { timeInterpreter, history: null };
  }

  const history = new EpochScheduleHistoryAdapter(
    node,
    {
      slotLengthMs: chain.history.slotLengthMs,
      refreshIntervalMs: chain.history.refreshIntervalMs,
      timeoutMs: rpcTimeoutMs,
    },
    createChildLogger('era-history'),
  );
  const timeInterpreter = TimeInterpreter.create({
    effect: asyncEffect,
    interpreter: () => history.getInterpreter(),
    startTime,
    tracer: loggerTracer(logger, asyncEffect),
  });
  return { timeInterpreter, history };
}

/**
 * Wires the monitor's adapters and use cases from a validated configuration.
 */
export function buildMonitorModules(config: ConfigSchema, overrides: ModuleOverrides = {}): MonitorModules {
  const clock = overrides.clock ?? createDefaultClock();
  const node =
    overrides.node ??
    new SolanaNodeAdapter(new Connection(config.rpc.httpEndpoint, { commitment: config.rpc.commitment }), config.rpc.commitment);

  const { timeInterpreter, history } = buildTimeInterpreter(config.chain, node, config.rpc.timeoutMs);
  const historySource: HistorySource = config.chain.history.source;

  const reportSyncProgress = new ReportSyncProgressUseCase({
    node,
    timeInterpreter,
    historySource,
    history,
    tolerance: SyncTolerance.fromSeconds(config.sync.toleranceSeconds),
    clock,
    rpcTimeoutMs: config.rpc.timeoutMs,
    logger: createChildLogger('report-sync-progress'),
  });

  return {
    clock,
    notificationPort: overrides.notificationPort ?? buildNotificationPort(config),
    reportSyncProgress,
  };
}
