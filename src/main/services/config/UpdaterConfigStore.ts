import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { UpdaterConfig } from '@shared/contracts';
import { BuildNumber } from '@main/services/plugins/BuildNumber';

const configSchema = z.object({
  pluginsDownloadUrl: z.string().url(),
  buildNumber: z.string().refine((value) => BuildNumber.parse(value) !== null, 'buildNumber invalido'),
  forceHttps: z.boolean(),
  startupWizardMode: z.boolean()
});

const DEFAULT_CONFIG: UpdaterConfig = {
  pluginsDownloadUrl: 'https://plugins.example.invalid/pluginManager',
  buildNumber: '1.0',
  forceHttps: true,
  startupWizardMode: false
};

export class UpdaterConfigStore {
  private readonly filePath: string;
  private readonly cache: UpdaterConfig;

  constructor(baseDir: string) {
    const configDir = path.join(baseDir, 'config');
    fs.mkdirSync(configDir, { recursive: true });
    this.filePath = path.join(configDir, 'plugin-updater.config.json');
    this.cache = this.load();
  }

  get(): UpdaterConfig {
    return { ...this.cache };
  }

  buildNumber(): BuildNumber | null {
    return BuildNumber.parse(this.cache.buildNumber);
  }

  private load(): UpdaterConfig {
    if (!fs.existsSync(this.filePath)) {
      this.persist(DEFAULT_CONFIG);
      return { ...DEFAULT_CONFIG };
    }

    try {
      const raw = fs.readFileSync(this.filePath, 'utf-8');
      const parsed = configSchema.safeParse(JSON.parse(raw));
      if (parsed.success) {
        return parsed.data;
      }
    } catch {
      // arquivo corrompido: volta ao default abaixo
    }

    this.persist(DEFAULT_CONFIG);
    return { ...DEFAULT_CONFIG };
  }

  private persist(config: UpdaterConfig): void {
    fs.writeFileSync(this.filePath, JSON.stringify(config, null, 2), 'utf-8');
  }
}
