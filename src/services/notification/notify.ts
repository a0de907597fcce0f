import type { Logger } from "pino";
import { NotificationArgs, NotificationDispatcher } from "./notification.types";

/** Sends a notification; a failure is logged and never reaches the caller. */
export async function notifySafely(
  dispatcher: NotificationDispatcher,
  logger: Logger,
  ...args: NotificationArgs
): Promise<boolean> {
  try {
    await dispatcher.send(...args);
    return true;
  } catch (error) {
    logger.warn({ error, kind: args[0], userId: args[1].userId }, "Notification failed");
    return false;
  }
}
