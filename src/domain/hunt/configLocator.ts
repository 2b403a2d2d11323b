import { z } from 'zod';
import { DomainError, ErrorCodes } from '../errors';

export type ConfigLocator =
  | { kind: 'file'; path: string }
  | { kind: 'url'; url: string };

const urlSchema = z.string().url();

// Stored as `mode::path`, e.g. `file::assets/schedule.png` or `url::https://...`.
export function parseConfigLocator(name: string, value: string): ConfigLocator {
  const separator = value.indexOf('::');
  if (separator < 0) {
    throw new DomainError(`Config ${name} is not in mode::path form`, ErrorCodes.InvalidConfig);
  }

  const mode = value.slice(0, separator).trim();
  const path = value.slice(separator + 2).trim();

  if (path.length === 0) {
    throw new DomainError(`Config ${name} has an empty path`, ErrorCodes.InvalidConfig);
  }

  if (mode === 'file') {
    return { kind: 'file', path };
  }

  if (mode === 'url') {
    const parsed = urlSchema.safeParse(path);
    if (!parsed.success) {
      throw new DomainError(`Config ${name} has a malformed url`, ErrorCodes.InvalidConfig);
    }

    return { kind: 'url', url: parsed.data };
  }

  throw new DomainError(`Config ${name} uses unknown mode "${mode}"`, ErrorCodes.InvalidConfig);
}
