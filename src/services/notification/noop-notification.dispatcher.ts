import { NotificationArgs, NotificationDispatcher } from "./notification.types";

export class NoopNotificationDispatcher implements NotificationDispatcher {
  async send(..._args: NotificationArgs): Promise<void> {
    return;
  }
}
