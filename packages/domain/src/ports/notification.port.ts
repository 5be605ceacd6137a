export interface NotificationMessage {
  readonly type: 'status' | 'warning' | 'error' | 'info' | 'success';
  readonly title: string;
  readonly message: string;
  readonly data?: Record<string, unknown>;
  readonly timestamp?: number;
}

export interface NotificationPort {
  send(message: NotificationMessage): Promise<void>;
}
