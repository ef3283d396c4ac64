import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';

export const CliCredentialsSchema = z.object({
  access_token: z.string().min(1),
  user_id: z.string().min(1),
  email: z.string().optional(),
  base_url: z.string().optional(),
});
export type CliCredentials = z.infer<typeof CliCredentialsSchema>;

export function defaultCredentialsPath(): string {
  return path.join(os.homedir(), '.pine', 'config.json');
}

/** Stored credentials, or undefined when none are saved or the file is unreadable JSON. */
export function loadCredentials(filePath: string): CliCredentials | undefined {
  if (!fs.existsSync(filePath)) {
    return undefined;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (err) {
    console.warn('[pine-cli] ignoring unreadable credentials file', {
      filePath,
      error: err instanceof Error ? err.message : String(err),
    });
    return undefined;
  }
  const result = CliCredentialsSchema.safeParse(parsed);
  return result.success ? result.data : undefined;
}

export function saveCredentials(filePath: string, credentials: CliCredentials): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, `${JSON.stringify(credentials, null, 2)}\n`, {
    encoding: 'utf8',
    mode: 0o600,
  });
}

export function clearCredentials(filePath: string): boolean {
  if (!fs.existsSync(filePath)) {
    return false;
  }
  fs.unlinkSync(filePath);
  return true;
}
