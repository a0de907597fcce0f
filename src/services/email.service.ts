import type { Logger } from "pino";
import type { EmailProvider } from "../infra/email/provider";
import {
  emailTemplates,
  type EmailTemplateId,
  type EmailTemplateContextMap,
} from "../infra/email/templates";

export class EmailService {
  constructor(
    private provider: EmailProvider,
    private brandName: string
  ) {}

  async sendTemplate<T extends EmailTemplateId>(
    templateId: T,
    to: string | string[],
    context: EmailTemplateContextMap[T],
    logger?: Logger
  ) {
    try {
      const tmpl = emailTemplates[templateId](context, this.brandName);

      await this.provider.sendMail(
        { to, subject: tmpl.subject, html: tmpl.html, text: tmpl.text },
        logger
      );
    } catch (error) {
      logger?.error({ error, templateId }, "Failed to send templated email");
      throw error;
    }
  }
}
