import nodemailer from "nodemailer";
import type SMTPTransport from "nodemailer/lib/smtp-transport/index.js";
import { errnoCode, errorMessage } from "../../core/domain/errors.js";
import type {
  ProbeFailureCategory,
  ProbeResult,
} from "../../core/domain/entities/probe-result.entity.js";
import type { ConfigSnapshot } from "../../core/domain/repositories/config-store.repository.js";
import type { IConnectivityProbe } from "../../core/domain/services/connectivity-probe.service.js";

export const DEFAULT_EMAIL_HOST = "smtp.gmail.com";
export const DEFAULT_EMAIL_PORT = 587;

/** The part of a nodemailer transporter the probe needs. */
export interface VerifiableTransport {
  verify(): Promise<true>;
  close(): void;
}

export type TransportFactory = (options: SMTPTransport.Options) => VerifiableTransport;

const defaultTransportFactory: TransportFactory = (options) => nodemailer.createTransport(options);

class ProbeTimeoutError extends Error {
  constructor(ms: number) {
    super(`No answer within ${ms} ms`);
    this.name = "ProbeTimeoutError";
  }
}

const GUIDANCE: Record<ProbeFailureCategory, string> = {
  "connection-refused": "Connection refused. Check EMAIL_HOST and EMAIL_PORT.",
  "unknown-host": "Unknown host. Check the spelling of EMAIL_HOST and the machine's DNS.",
  timeout: "Timed out waiting for the mail server. Check the port and any firewall in between.",
  "auth-rejected": "Authentication rejected. Check EMAIL_USERNAME and EMAIL_PASSWORD.",
  tls: "TLS negotiation failed. The server certificate could not be verified.",
  unreachable: "The mail server could not be reached.",
  "incomplete-config": "Email settings are incomplete. Set EMAIL_USERNAME and EMAIL_PASSWORD.",
};

const GMAIL_APP_PASSWORD_HINT =
  "Gmail accounts need an app password: https://myaccount.google.com/apppasswords";

export function categorize(e: unknown): ProbeFailureCategory {
  if (e instanceof ProbeTimeoutError) return "timeout";
  const code = errnoCode(e);
  const message = errorMessage(e);
  if (code === "EAUTH") return "auth-rejected";
  if (code === "ETIMEDOUT" || /timeout|timed out/i.test(message)) return "timeout";
  if (code === "EDNS" || /ENOTFOUND|EAI_AGAIN/.test(message)) return "unknown-host";
  if (message.includes("ECONNREFUSED")) return "connection-refused";
  if (code === "ETLS" || /certificate|self[- ]signed|tls|ssl/i.test(message)) return "tls";
  return "unreachable";
}

/**
 * One-shot SMTP login check.
 * Connects, authenticates and quits without sending anything; failures
 * come back as a result, never as an exception.
 */
export class NodemailerProbe implements IConnectivityProbe {
  constructor(
    private timeoutMs: number,
    private createTransport: TransportFactory = defaultTransportFactory,
  ) {}

  async testConnection(config: ConfigSnapshot): Promise<ProbeResult> {
    const host = config.EMAIL_HOST?.trim() || DEFAULT_EMAIL_HOST;
    const port = Number.parseInt(config.EMAIL_PORT ?? "", 10) || DEFAULT_EMAIL_PORT;
    const user = config.EMAIL_USERNAME?.trim() ?? "";
    const pass = config.EMAIL_PASSWORD ?? "";

    if (!user || !pass) {
      return { success: false, category: "incomplete-config", message: GUIDANCE["incomplete-config"] };
    }

    const transport = this.createTransport({
      host,
      port,
      secure: port === 465,
      auth: { user, pass },
      connectionTimeout: this.timeoutMs,
      greetingTimeout: this.timeoutMs,
      socketTimeout: this.timeoutMs,
    });

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new ProbeTimeoutError(this.timeoutMs)), this.timeoutMs);
    });

    try {
      await Promise.race([transport.verify(), deadline]);
      return {
        success: true,
        message: `Connected to ${host}:${port} and logged in as ${user}.`,
      };
    } catch (e) {
      const category = categorize(e);
      let message = `${host}:${port}: ${GUIDANCE[category]}`;
      if (category === "auth-rejected" && /Username and Password not accepted/i.test(errorMessage(e))) {
        message += ` ${GMAIL_APP_PASSWORD_HINT}`;
      }
      return { success: false, category, message };
    } finally {
      clearTimeout(timer);
      transport.close();
    }
  }
}
