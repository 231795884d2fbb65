export interface SecretStore {
  getSecret(key: string): string | undefined;
}

function normalizeSecret(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export class EnvSecretStore implements SecretStore {
  constructor(
    private readonly prefix = "",
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  getSecret(key: string): string | undefined {
    const prefixed = this.prefix ? normalizeSecret(this.env[`${this.prefix}${key}`]) : undefined;
    return prefixed ?? normalizeSecret(this.env[key]);
  }
}

/** In-memory store, handy for tests and for secrets injected by a host process. */
export class MapSecretStore implements SecretStore {
  private readonly secrets: Map<string, string>;

  constructor(entries: Record<string, string> = {}) {
    this.secrets = new Map(Object.entries(entries));
  }

  getSecret(key: string): string | undefined {
    return normalizeSecret(this.secrets.get(key));
  }
}

export const defaultSecretStore = new EnvSecretStore();
