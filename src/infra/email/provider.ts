import type { Logger } from "pino";

export interface EmailPayload {
  to: string | string[];
  subject: string;
  html: string;
  text?: string;
}

export interface EmailProvider {
  sendMail(payload: EmailPayload, logger?: Logger): Promise<void>;
}

export type EmailProviderName = "sendgrid" | "log";

export type SendGridConfig = {
  apiKey?: string;
  fromEmail: string;
  fromName: string;
  endpoint?: string;
  fetchFn?: typeof fetch;
};

const SENDGRID_ENDPOINT = "https://api.sendgrid.com/v3/mail/send";

export class SendGridEmailProvider implements EmailProvider {
  private readonly fetchFn: typeof fetch;

  constructor(private readonly config: SendGridConfig) {
    this.fetchFn = config.fetchFn ?? fetch;
  }

  async sendMail(payload: EmailPayload, logger?: Logger): Promise<void> {
    if (!this.config.apiKey) {
      throw new Error("SendGrid API Key is not configured.");
    }

    const recipients = Array.isArray(payload.to) ? payload.to : [payload.to];
    const start = Date.now();

    const content = [{ type: "text/html", value: payload.html }];
    if (payload.text) content.unshift({ type: "text/plain", value: payload.text });

    const response = await this.fetchFn(this.config.endpoint ?? SENDGRID_ENDPOINT, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.config.apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        personalizations: [{ to: recipients.map((email) => ({ email })) }],
        from: { email: this.config.fromEmail, name: this.config.fromName },
        subject: payload.subject,
        content,
      }),
    });

    if (!response.ok) {
      const errorText = await response.text();
      logger?.error({ status: response.status }, "SendGrid rejected the message");
      throw new Error(`SendGrid API Error: ${response.status} ${errorText}`);
    }

    logger?.info(
      { subject: payload.subject, recipients: recipients.length, duration: Date.now() - start },
      "Email sent via SendGrid API"
    );
  }
}

/** Writes the message to the log instead of delivering it. */
export class LogEmailProvider implements EmailProvider {
  readonly sent: EmailPayload[] = [];

  constructor(private readonly keep = false) {}

  async sendMail(payload: EmailPayload, logger?: Logger): Promise<void> {
    if (this.keep) this.sent.push(payload);
    logger?.info({ subject: payload.subject }, "Email suppressed (log provider)");
  }
}

export function createEmailProvider(
  name: EmailProviderName,
  sendgrid: SendGridConfig
): EmailProvider {
  switch (name) {
    case "sendgrid":
      return new SendGridEmailProvider(sendgrid);
    case "log":
      return new LogEmailProvider();
  }
}
