export interface NotificationContent {
  readonly title: string;
  readonly body: string;
  readonly icon?: Buffer | null;
  /** Ongoing notifications the phone does not let the user dismiss; shown until closed. */
  readonly persistent?: boolean;
}

/**
 * Local notification surface. Methods throw SinkUnavailableError when the
 * notification server cannot be reached.
 */
export interface NotificationSinkPort {
  create(content: NotificationContent): Promise<number>;
  /** Replaces a rendered notification in place; returns the id now showing it. */
  update(notificationId: number, content: NotificationContent): Promise<number>;
  dismiss(notificationId: number): Promise<void>;
  close?(): Promise<void>;
}
