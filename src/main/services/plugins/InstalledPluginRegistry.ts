import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { PluginDescriptor } from '@shared/contracts';
import { Logger } from '@main/services/logging/Logger';
import { BuildNumber } from '@main/services/plugins/BuildNumber';
import type { ManifestReader, PluginRegistry } from '@main/services/plugins/collaborators';
import bundledBrokenPlugins from '@main/services/plugins/data/broken-plugins.json';

const brokenPluginsSchema = z.record(z.string().min(1), z.array(z.string().min(1)));

export type BrokenPluginList = Record<string, string[]>;

interface InstalledPluginRegistryOptions {
  pluginsDir: string;
  manifestReader: ManifestReader;
  logger: Logger;
  currentBuild: BuildNumber | null;
  brokenPlugins?: BrokenPluginList;
}

/**
 * Installed plugins as found in the plugins directory when `refresh()` last ran.
 * Queries read that snapshot only; an update marked during the session does not change it,
 * since the superseded plugin stays loaded until restart.
 */
export class InstalledPluginRegistry implements PluginRegistry {
  private readonly pluginsDir: string;
  private readonly manifestReader: ManifestReader;
  private readonly logger: Logger;
  private readonly currentBuild: BuildNumber | null;
  private readonly brokenVersions: Map<string, Set<string>>;
  private readonly updatedThisSession = new Map<string, PluginDescriptor | null>();
  private snapshot = new Map<string, PluginDescriptor>();

  constructor(options: InstalledPluginRegistryOptions) {
    this.pluginsDir = options.pluginsDir;
    this.manifestReader = options.manifestReader;
    this.logger = options.logger;
    this.currentBuild = options.currentBuild;
    this.brokenVersions = toBrokenVersionMap(options.brokenPlugins ?? brokenPluginsSchema.parse(bundledBrokenPlugins));
  }

  static async load(options: InstalledPluginRegistryOptions): Promise<InstalledPluginRegistry> {
    const registry = new InstalledPluginRegistry(options);
    await registry.refresh();
    return registry;
  }

  async refresh(): Promise<void> {
    const next = new Map<string, PluginDescriptor>();
    if (fs.existsSync(this.pluginsDir)) {
      const entries = fs.readdirSync(this.pluginsDir).sort();
      for (const name of entries) {
        const entryPath = path.join(this.pluginsDir, name);
        const descriptor = await this.manifestReader.readManifest(entryPath);
        if (!descriptor) {
          continue;
        }
        if (next.has(descriptor.id)) {
          this.logger.warn('plugin.registry.duplicate', {
            pluginId: descriptor.id,
            path: entryPath
          });
          continue;
        }
        next.set(descriptor.id, { ...descriptor, path: entryPath });
      }
    }

    this.snapshot = next;
    this.logger.debug('plugin.registry.refreshed', {
      pluginsDir: this.pluginsDir,
      count: next.size
    });
  }

  list(): PluginDescriptor[] {
    return Array.from(this.snapshot.values(), cloneDescriptor);
  }

  isInstalled(pluginId: string): boolean {
    return this.snapshot.has(pluginId);
  }

  getInstalled(pluginId: string): PluginDescriptor | null {
    const descriptor = this.snapshot.get(pluginId);
    return descriptor ? cloneDescriptor(descriptor) : null;
  }

  isIncompatible(descriptor: PluginDescriptor, buildNumber: BuildNumber | null): boolean {
    const build = buildNumber ?? this.currentBuild;
    if (!build) {
      return false;
    }

    const since = descriptor.sinceBuild ? BuildNumber.parse(descriptor.sinceBuild) : null;
    if (since && build.compareTo(since) < 0) {
      return true;
    }

    const until = descriptor.untilBuild ? BuildNumber.parse(descriptor.untilBuild) : null;
    return until !== null && build.compareTo(until) > 0;
  }

  isKnownBroken(descriptor: PluginDescriptor): boolean {
    return this.brokenVersions.get(descriptor.id)?.has(descriptor.version) ?? false;
  }

  wasUpdatedThisSession(pluginId: string): boolean {
    return this.updatedThisSession.has(pluginId);
  }

  markUpdated(pluginId: string, descriptor: PluginDescriptor | null): void {
    this.updatedThisSession.set(pluginId, descriptor ? cloneDescriptor(descriptor) : null);
    this.logger.info('plugin.registry.marked_updated', {
      pluginId,
      version: descriptor?.version ?? null
    });
  }
}

function toBrokenVersionMap(list: BrokenPluginList): Map<string, Set<string>> {
  const map = new Map<string, Set<string>>();
  for (const [pluginId, versions] of Object.entries(list)) {
    map.set(pluginId, new Set(versions));
  }
  return map;
}

function cloneDescriptor(descriptor: PluginDescriptor): PluginDescriptor {
  return {
    ...descriptor,
    dependencies: descriptor.dependencies.slice()
  };
}
