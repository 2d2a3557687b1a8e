import type { IConfigStore } from "../domain/repositories/config-store.repository.js";

export interface CredentialGroupStatus {
  name: string;
  configured: boolean;
  /** Key to "has a value"; values themselves are never returned. */
  details: Record<string, boolean>;
}

export interface ConfigStatus {
  ok: boolean;
  groups: CredentialGroupStatus[];
}

const CREDENTIAL_GROUPS: { name: string; keys: string[] }[] = [
  { name: "facebook_api", keys: ["FB_ACCESS_TOKEN", "FB_ACCOUNT_ID"] },
  { name: "email", keys: ["EMAIL_USERNAME", "EMAIL_PASSWORD", "EMAIL_RECIPIENT"] },
  { name: "openai_api", keys: ["OPENAI_API_KEY"] },
];

export class CheckConfigUseCase {
  constructor(private configStore: IConfigStore) {}

  async execute(envFile: string): Promise<ConfigStatus> {
    const snapshot = await this.configStore.read(envFile);
    const groups = CREDENTIAL_GROUPS.map(({ name, keys }) => {
      const details: Record<string, boolean> = {};
      for (const key of keys) details[key] = (snapshot[key] ?? "").trim() !== "";
      return { name, configured: Object.values(details).every(Boolean), details };
    });
    return { ok: groups.every((g) => g.configured), groups };
  }
}
