export type PushType = 'note' | 'link' | 'file';

interface StreamEventBase {
  readonly eventId: string;
  readonly sourceDeviceId: string | null;
  /** Epoch milliseconds. Service-assigned for pushes, receipt time for ephemerals. */
  readonly timestamp: number;
  /** True when the event reached us inside an end-to-end encrypted envelope. */
  readonly encrypted: boolean;
}

export interface PushEventData extends StreamEventBase {
  readonly type: 'push';
  readonly notificationKey: string;
  readonly pushType: PushType;
  readonly title: string | null;
  readonly body: string;
  readonly url: string | null;
  readonly fileName: string | null;
  readonly channelOrChatId: string | null;
  readonly senderName: string | null;
}

export interface MirrorNotificationEventData extends StreamEventBase {
  readonly type: 'mirror';
  readonly notificationKey: string;
  readonly appPackage: string;
  readonly applicationName: string | null;
  readonly title: string;
  readonly body: string;
  readonly iconBytes: Buffer | null;
  readonly dismissible: boolean;
}

export interface DismissNotificationEventData extends StreamEventBase {
  readonly type: 'dismiss';
  readonly notificationKey: string;
}

export interface DeviceStateEventData extends StreamEventBase {
  readonly type: 'device-state';
  readonly reason: 'device-list-changed';
}

export type StreamEvent =
  | PushEventData
  | MirrorNotificationEventData
  | DismissNotificationEventData
  | DeviceStateEventData;

export type StreamEventType = StreamEvent['type'];
