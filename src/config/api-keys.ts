// This module loads HTTP API keys from the environment and keeps only their hashes in memory.

import { createHash, timingSafeEqual } from 'node:crypto';
import { z } from 'zod';

export interface ApiKeyPrincipal {
  keyId: string;
  name: string;
}

interface StoredApiKey extends ApiKeyPrincipal {
  hash: Buffer;
}

const keyMetadataSchema = z.object({
  key: z.string().min(1),
  name: z.string().trim().min(1).optional()
});

// This function computes a deterministic SHA-256 digest so raw keys never stay resident.
export function hashApiToken(token: string): Buffer {
  return createHash('sha256').update(token, 'utf8').digest();
}

function tryParseJson(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
}

// This helper parses one API_KEY_* value that is either a plain key or JSON metadata.
// Values that look like JSON but do not parse are taken as the literal key.
function parseKeyValue(suffix: string, value: string): { key: string; name: string } {
  if (value.trimStart().startsWith('{')) {
    const parsed = keyMetadataSchema.safeParse(tryParseJson(value));
    if (parsed.success) {
      return { key: parsed.data.key, name: parsed.data.name ?? `Key ${suffix}` };
    }
  }

  return { key: value, name: `Key ${suffix}` };
}

export class ApiKeyValidator {
  private readonly keys: readonly StoredApiKey[];

  public constructor(entries: Array<{ key: string; name: string }>) {
    const seen = new Set<string>();
    const keys: StoredApiKey[] = [];

    for (const entry of entries) {
      const hash = hashApiToken(entry.key);
      const keyId = hash.toString('hex').slice(0, 12);
      if (entry.key.length === 0 || seen.has(keyId)) {
        continue;
      }
      seen.add(keyId);
      keys.push({ keyId, name: entry.name, hash });
    }

    this.keys = Object.freeze(keys);
  }

  // This factory reads API_KEY_<NAME> variables and the comma-separated API_KEYS list.
  public static fromEnv(env: NodeJS.ProcessEnv = process.env): ApiKeyValidator {
    const entries: Array<{ key: string; name: string }> = [];

    for (const [name, value] of Object.entries(env).sort(([left], [right]) => left.localeCompare(right))) {
      if (!name.startsWith('API_KEY_') || value === undefined || value.length === 0) {
        continue;
      }
      entries.push(parseKeyValue(name.slice('API_KEY_'.length), value));
    }

    for (const key of (env.API_KEYS ?? '').split(',').map((entry) => entry.trim())) {
      if (key.length > 0) {
        entries.push({ key, name: 'Legacy key' });
      }
    }

    return new ApiKeyValidator(entries);
  }

  public get size(): number {
    return this.keys.length;
  }

  public hasKeys(): boolean {
    return this.keys.length > 0;
  }

  // This method compares digests in constant time and returns the matching key identity.
  public validate(token: string): ApiKeyPrincipal | null {
    const candidate = hashApiToken(token);
    let match: ApiKeyPrincipal | null = null;

    for (const key of this.keys) {
      if (timingSafeEqual(candidate, key.hash) && match === null) {
        match = { keyId: key.keyId, name: key.name };
      }
    }

    return match;
  }
}
