import { ConfigValidationError } from "../domain/errors.js";
import type { BootstrapConfig } from "../domain/entities/config.entity.js";
import type { ProbeResult } from "../domain/entities/probe-result.entity.js";
import type { IConfigStore } from "../domain/repositories/config-store.repository.js";
import type { IConnectivityProbe } from "../domain/services/connectivity-probe.service.js";
import type { IPrompter } from "../domain/services/operator.service.js";
import { EmailSettingsSchema, formatIssues } from "../../adapters/validation.js";
import {
  DEFAULT_EMAIL_HOST,
  DEFAULT_EMAIL_PORT,
} from "../../infrastructure/services/nodemailer-probe.service.js";

const EMAIL_FIELDS: { key: string; label: string }[] = [
  { key: "EMAIL_HOST", label: "SMTP host" },
  { key: "EMAIL_PORT", label: "SMTP port" },
  { key: "EMAIL_USERNAME", label: "Sender email" },
  { key: "EMAIL_PASSWORD", label: "Password (app password for Gmail)" },
  { key: "EMAIL_RECIPIENT", label: "Report recipient(s), comma-separated" },
];

const FALLBACKS: Record<string, string> = {
  EMAIL_HOST: DEFAULT_EMAIL_HOST,
  EMAIL_PORT: String(DEFAULT_EMAIL_PORT),
};

export interface ConfigureEmailRequest {
  testConnection: boolean;
  onMessage?: (message: string) => void;
}

export interface ConfigureEmailResult {
  savedKeys: string[];
  probe?: ProbeResult;
}

/**
 * Interactive email setup: prompt, validate, save in one write, then try
 * the credentials. A failed login does not undo the save.
 */
export class ConfigureEmailUseCase {
  constructor(
    private configStore: IConfigStore,
    private probe: IConnectivityProbe,
    private prompter: IPrompter,
    private config: BootstrapConfig,
  ) {}

  async execute(request: ConfigureEmailRequest): Promise<ConfigureEmailResult> {
    const say = request.onMessage ?? (() => {});
    const { envFile, defaults } = this.config;
    await this.configStore.ensureExists(envFile, defaults);
    const current = await this.configStore.read(envFile);
    const secretKeys = new Set(defaults.filter((d) => d.secret).map((d) => d.key));

    const answers: Record<string, string> = {};
    try {
      for (const { key, label } of EMAIL_FIELDS) {
        const existing = current[key] ?? "";
        if (secretKeys.has(key)) {
          const hint = existing ? " (leave blank to keep the current one)" : "";
          const answer = await this.prompter.askSecret(`${label}${hint}`);
          answers[key] = answer || existing;
        } else {
          answers[key] = await this.prompter.ask(label, existing || FALLBACKS[key] || "");
        }
      }
    } finally {
      this.prompter.close();
    }

    const parsed = EmailSettingsSchema.safeParse(answers);
    if (!parsed.success) {
      throw new ConfigValidationError(`Email settings not saved. ${formatIssues(parsed.error)}.`);
    }

    await this.configStore.setMany(envFile, parsed.data);
    const savedKeys = Object.keys(parsed.data);
    say(`Saved ${savedKeys.join(", ")} to ${envFile}.`);

    if (!request.testConnection) return { savedKeys };

    say("Testing the SMTP login...");
    const probe = await this.probe.testConnection(await this.configStore.read(envFile));
    return { savedKeys, probe };
  }
}
