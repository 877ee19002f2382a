import nodemailer from "nodemailer";

import type { AppConfig } from "@/config/config";
import { recordDelivery } from "@/monitoring/prometheus";
import { CSV_CONTENT_TYPE, readableTimestamp, resultFileName } from "@/services/formatter/resultFormatter";
import { DeliveryError, describeError } from "@/utils/errors";
import { logger } from "@/utils/logger";
import { type Sleep, wait } from "@/utils/sleep";

export type NotificationKind = "success" | "failure";

export interface MailAttachment {
  filename: string;
  content: string;
  contentType: string;
}

export interface MailMessage {
  from: string;
  to: string[];
  subject: string;
  text: string;
  attachments?: MailAttachment[];
}

export interface MailTransport {
  sendMail(message: MailMessage): Promise<unknown>;
}

export interface NotifierOptions {
  transport: MailTransport;
  fromEmail: string;
  dryRun: boolean;
  maxAttempts?: number;
  retryDelayMs?: number;
  sleep?: Sleep;
  now?: () => Date;
}

const DEFAULT_MAX_ATTEMPTS = 2;
const DEFAULT_RETRY_DELAY_MS = 5000;

export function createSmtpTransport(smtp: AppConfig["smtp"]): MailTransport {
  const transporter = nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: smtp.port === 465,
    requireTLS: smtp.useTls,
    auth: smtp.user ? { user: smtp.user, pass: smtp.password } : undefined,
  });

  return {
    sendMail: (message) => transporter.sendMail(message),
  };
}

function successBody(jobName: string, timestamp: string): string {
  return [
    "Hello,",
    "",
    `The scheduled job '${jobName}' has completed successfully.`,
    "",
    "Please find the results attached as a CSV file.",
    "",
    `Execution Time: ${timestamp}`,
    "",
    "Best regards,",
    "Scheduled Jobs Service",
    "",
  ].join("\n");
}

function failureBody(jobName: string, timestamp: string, errorMessage: string): string {
  return [
    "Hello,",
    "",
    `The scheduled job '${jobName}' has failed during execution.`,
    "",
    `Execution Time: ${timestamp}`,
    "",
    "Error Details:",
    errorMessage,
    "",
    "Please review the job configuration and data source, then contact your system administrator if the issue persists.",
    "",
    "Best regards,",
    "Scheduled Jobs Service",
    "",
  ].join("\n");
}

export class Notifier {
  private readonly transport: MailTransport;
  private readonly fromEmail: string;
  private readonly dryRun: boolean;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly sleep: Sleep;
  private readonly now: () => Date;

  constructor(options: NotifierOptions) {
    this.transport = options.transport;
    this.fromEmail = options.fromEmail;
    this.dryRun = options.dryRun;
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.sleep = options.sleep ?? wait;
    this.now = options.now ?? (() => new Date());
  }

  async deliverSuccess(jobName: string, recipients: string[], content: string): Promise<void> {
    const at = this.now();
    const timestamp = readableTimestamp(at);

    await this.deliver("success", jobName, {
      from: this.fromEmail,
      to: recipients,
      subject: `Job Results: ${jobName} - ${timestamp}`,
      text: successBody(jobName, timestamp),
      attachments: [{ filename: resultFileName(jobName, at), content, contentType: CSV_CONTENT_TYPE }],
    });
  }

  async deliverFailure(jobName: string, recipients: string[], errorMessage: string): Promise<void> {
    const timestamp = readableTimestamp(this.now());

    await this.deliver("failure", jobName, {
      from: this.fromEmail,
      to: recipients,
      subject: `Job Failure: ${jobName} - ${timestamp}`,
      text: failureBody(jobName, timestamp, errorMessage),
    });
  }

  private async deliver(kind: NotificationKind, jobName: string, message: MailMessage): Promise<void> {
    if (this.dryRun) {
      logger.info("Dry run: email not sent", {
        kind,
        jobName,
        recipients: message.to.length,
        subject: message.subject,
        attachment: message.attachments?.[0]?.filename,
      });
      recordDelivery(kind, "dry_run");
      return;
    }

    let lastError: unknown;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      logger.info("Sending email", { kind, jobName, recipients: message.to.length, attempt, maxAttempts: this.maxAttempts });

      try {
        await this.transport.sendMail(message);
        recordDelivery(kind, "sent");
        logger.info("Email sent", { kind, jobName });
        return;
      } catch (error) {
        lastError = error;
        logger.error("Email delivery attempt failed", { kind, jobName, attempt, error: describeError(error) });
      }

      if (attempt < this.maxAttempts) {
        await this.sleep(this.retryDelayMs);
      }
    }

    recordDelivery(kind, "failed");
    throw new DeliveryError(
      `Email delivery for job '${jobName}' failed after ${this.maxAttempts} attempts: ${describeError(lastError)}`,
      { cause: lastError },
    );
  }
}
