import type { Logger } from "pino";
import type { EmailService } from "../email.service";
import type { UserDirectory } from "../../repositories/interfaces";
import { AppError } from "../../utils/error";
import { NotificationArgs, NotificationDispatcher } from "./notification.types";

export class EmailNotificationDispatcher implements NotificationDispatcher {
  constructor(
    private readonly users: UserDirectory,
    private readonly email: EmailService,
    private readonly logger: Logger
  ) {}

  async send(...[kind, recipient, payload]: NotificationArgs): Promise<void> {
    const user = await this.users.findById(recipient.userId);
    if (!user || !user.email) {
      throw new AppError(`No e-mail address for user ${recipient.userId}`, {
        code: "RECIPIENT_NOT_FOUND",
        status: 404,
        details: { userId: recipient.userId, kind },
      });
    }

    switch (kind) {
      case "credit_issued":
        await this.email.sendTemplate("CREDIT_ISSUED", user.email, payload, this.logger);
        break;
      case "payment_settled":
        await this.email.sendTemplate("PAYMENT_SETTLED", user.email, payload, this.logger);
        break;
      case "payment_overdue":
        await this.email.sendTemplate("PAYMENT_OVERDUE", user.email, payload, this.logger);
        break;
    }

    this.logger.debug({ kind, userId: recipient.userId }, "Notification sent");
  }
}
