import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { PluginDescriptor } from '@shared/contracts';
import { Logger } from '@main/services/logging/Logger';
import type { ArchiveExtractor, ManifestReader } from '@main/services/plugins/collaborators';

interface PluginDescriptorExtractorOptions {
  manifestReader: ManifestReader;
  archiveExtractor: ArchiveExtractor;
  logger: Logger;
  tempRoot?: string;
}

export class PluginDescriptorExtractor {
  private readonly manifestReader: ManifestReader;
  private readonly archiveExtractor: ArchiveExtractor;
  private readonly logger: Logger;
  private readonly tempRoot: string;

  constructor(options: PluginDescriptorExtractorOptions) {
    this.manifestReader = options.manifestReader;
    this.archiveExtractor = options.archiveExtractor;
    this.logger = options.logger;
    this.tempRoot = options.tempRoot ?? os.tmpdir();
  }

  /**
   * `null` is a normal outcome: the artifact simply carries no readable descriptor.
   * A `.zip` is only description-bearing when it holds exactly one top-level entry.
   */
  async extract(artifactPath: string): Promise<PluginDescriptor | null> {
    const direct = await this.manifestReader.readManifest(artifactPath);
    if (direct) {
      return direct;
    }

    if (!artifactPath.toLowerCase().endsWith('.zip')) {
      return null;
    }

    fs.mkdirSync(this.tempRoot, { recursive: true });
    const outputDir = fs.mkdtempSync(path.join(this.tempRoot, 'plugin-extract-'));
    try {
      await this.archiveExtractor.extractAll(artifactPath, outputDir);
      const entries = fs.readdirSync(outputDir);
      const [single] = entries;
      if (entries.length !== 1 || single === undefined) {
        this.logger.debug('plugin.extract.ambiguous_archive', {
          artifactPath,
          topLevelEntries: entries.length
        });
        return null;
      }

      const descriptor = await this.manifestReader.readManifest(path.join(outputDir, single));
      return descriptor ? { ...descriptor, path: artifactPath } : null;
    } finally {
      fs.rmSync(outputDir, { recursive: true, force: true });
    }
  }
}
