import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { PluginDescriptor } from '@shared/contracts';
import { Logger } from '@main/services/logging/Logger';
import type { ManifestReader } from '@main/services/plugins/collaborators';
import { loadZip } from '@main/services/plugins/ZipArchiveExtractor';

export const PLUGIN_MANIFEST_FILE = 'plugin.json';

const manifestSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  version: z.string().min(1),
  description: z.string().optional(),
  dependencies: z.array(z.string().min(1)).default([]),
  sinceBuild: z.string().min(1).optional(),
  untilBuild: z.string().min(1).optional(),
  url: z.string().min(1).optional()
});

/**
 * Reads `plugin.json` from an unpacked plugin directory, from a raw package (a zip carrying
 * the manifest at its root) or from the first raw package under a directory's `lib/`.
 */
export class PluginManifestReader implements ManifestReader {
  constructor(private readonly logger?: Logger) {}

  async readManifest(targetPath: string): Promise<PluginDescriptor | null> {
    if (!fs.existsSync(targetPath)) {
      return null;
    }

    if (fs.statSync(targetPath).isDirectory()) {
      return this.readFromDirectory(targetPath);
    }

    return this.readFromPackage(targetPath);
  }

  private async readFromDirectory(dir: string): Promise<PluginDescriptor | null> {
    const manifestPath = path.join(dir, PLUGIN_MANIFEST_FILE);
    if (fs.existsSync(manifestPath)) {
      return this.parse(fs.readFileSync(manifestPath, 'utf-8'), manifestPath, dir);
    }

    const libDir = path.join(dir, 'lib');
    if (!fs.existsSync(libDir) || !fs.statSync(libDir).isDirectory()) {
      return null;
    }

    const packages = fs
      .readdirSync(libDir, { withFileTypes: true })
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort();
    for (const name of packages) {
      const descriptor = await this.readFromPackage(path.join(libDir, name));
      if (descriptor) {
        return { ...descriptor, path: dir };
      }
    }

    return null;
  }

  private async readFromPackage(filePath: string): Promise<PluginDescriptor | null> {
    let text: string | null;
    try {
      const zip = await loadZip(filePath);
      const manifest = zip.file(PLUGIN_MANIFEST_FILE);
      text = manifest ? await manifest.async('string') : null;
    } catch (error) {
      this.logger?.debug('plugin.manifest.not_a_package', {
        path: filePath,
        reason: error instanceof Error ? error.message : String(error)
      });
      return null;
    }

    return text === null ? null : this.parse(text, `${filePath}!/${PLUGIN_MANIFEST_FILE}`, filePath);
  }

  private parse(text: string, source: string, pluginPath: string): PluginDescriptor | null {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      this.logger?.warn('plugin.manifest.invalid_json', { source });
      return null;
    }

    const parsed = manifestSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger?.warn('plugin.manifest.invalid', {
        source,
        error: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
      });
      return null;
    }

    const manifest = parsed.data;
    return {
      id: manifest.id,
      name: manifest.name,
      version: manifest.version,
      description: manifest.description ?? null,
      dependencies: manifest.dependencies,
      sinceBuild: manifest.sinceBuild ?? null,
      untilBuild: manifest.untilBuild ?? null,
      url: manifest.url ?? null,
      path: pluginPath
    };
  }
}
