import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export class InstallationIdStore {
  private readonly filePath: string;
  private cache: string | null = null;

  constructor(baseDir: string) {
    const configDir = path.join(baseDir, 'config');
    fs.mkdirSync(configDir, { recursive: true });
    this.filePath = path.join(configDir, 'installation-id');
  }

  get(): string {
    if (this.cache) {
      return this.cache;
    }

    const stored = this.read();
    if (stored) {
      this.cache = stored;
      return stored;
    }

    const created = crypto.randomUUID();
    fs.writeFileSync(this.filePath, `${created}\n`, 'utf-8');
    this.cache = created;
    return created;
  }

  private read(): string | null {
    if (!fs.existsSync(this.filePath)) {
      return null;
    }

    const value = fs.readFileSync(this.filePath, 'utf-8').trim();
    return UUID_PATTERN.test(value) ? value.toLowerCase() : null;
  }
}
