import nodemailer from "nodemailer";
import type { SendMailOptions } from "nodemailer";
import type { ResearchConfig } from "./config.js";
import { ConfigurationError, DeliveryFailed, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";

// ============================================================================
// Delivery
// ============================================================================

export interface Notifier {
  /** Throws ConfigurationError when delivery could not succeed. Checked before a run starts. */
  assertReady(): void;
  deliver(topic: string, summary: string): Promise<void>;
}

export interface MailTransport {
  sendMail(message: SendMailOptions): Promise<unknown>;
}

export const DEFAULT_SENDER = "no-reply@example.com";

type EmailConfig = Pick<ResearchConfig, "emailRecipient" | "smtp">;

export function createSmtpTransport({ smtp }: EmailConfig): MailTransport {
  const auth = smtp.username && smtp.password ? { user: smtp.username, pass: smtp.password } : undefined;
  return nodemailer.createTransport({
    host: smtp.server,
    port: smtp.port,
    secure: smtp.port === 465,
    requireTLS: smtp.port !== 465,
    auth,
  });
}

export class EmailNotifier implements Notifier {
  private readonly transport: MailTransport;

  constructor(
    private readonly config: EmailConfig,
    private readonly logger: Logger,
    transport?: MailTransport
  ) {
    this.transport = transport ?? createSmtpTransport(config);
  }

  assertReady(): void {
    this.recipient();
  }

  async deliver(topic: string, summary: string): Promise<void> {
    const to = this.recipient();
    const message: SendMailOptions = {
      from: this.config.smtp.username || DEFAULT_SENDER,
      to,
      subject: `Research Summary: ${topic}`,
      text: summary,
      encoding: "utf-8",
    };

    try {
      await this.transport.sendMail(message);
    } catch (error) {
      throw new DeliveryFailed(`Could not send summary to ${to}: ${errorMessage(error)}`, { cause: error });
    }
    this.logger.info({ to, topic }, "summary emailed");
  }

  private recipient(): string {
    if (!this.config.emailRecipient) {
      throw new ConfigurationError("EMAIL_RECIPIENT is not configured");
    }
    return this.config.emailRecipient;
  }
}
