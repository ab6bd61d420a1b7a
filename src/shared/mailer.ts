/**
 * Email Delivery
 * ==============
 * Outbound mail goes through an HTTP mail gateway (POST JSON).
 *
 * Usage:
 *   const mailer = createHttpEmailSender({ url, token, from, timeoutMs: 10000 });
 *   await mailer.send(["user@example.com"], "Subject", "<p>html</p>");
 *
 * When no gateway is configured, `createLogEmailSender()` only logs the
 * recipients and subject (local development).
 */

import axios from "axios";

import { ExternalApiError } from "./errors.js";
import { logger } from "./logger.js";

export interface EmailSender {
  send(addresses: string[], subject: string, htmlBody: string): Promise<void>;
}

export type HttpEmailSenderConfig = {
  url: string;
  token?: string;
  from: string;
  fromName?: string;
  timeoutMs: number;
};

function authHeaders(token?: string): Record<string, string> {
  const t = (token || "").trim();
  if (!t) {return {};}
  return { Authorization: t.toLowerCase().startsWith("bearer ") ? t : `Bearer ${t}` };
}

export function createHttpEmailSender(config: HttpEmailSenderConfig): EmailSender {
  return {
    async send(addresses, subject, htmlBody) {
      try {
        await axios.post(
          config.url,
          {
            from: config.fromName ? { email: config.from, name: config.fromName } : { email: config.from },
            to: addresses.map((email) => ({ email })),
            subject,
            html: htmlBody,
          },
          {
            headers: { "Content-Type": "application/json", ...authHeaders(config.token) },
            timeout: config.timeoutMs,
          }
        );
      } catch (err: unknown) {
        const status = axios.isAxiosError(err) ? err.response?.status : undefined;
        throw new ExternalApiError(
          "Mail",
          status ? `request failed with status ${status}` : "request failed",
          err
        );
      }
      logger.info("Email sent", { recipients: addresses.length, subject });
    },
  };
}

export function createLogEmailSender(): EmailSender {
  return {
    async send(addresses, subject) {
      logger.info("Email delivery not configured; message not sent", {
        recipients: addresses.length,
        subject,
      });
    },
  };
}
