import type { PluginDescriptor } from '@shared/contracts';
import type { BuildNumber } from '@main/services/plugins/BuildNumber';

export interface PluginRegistry {
  isInstalled(pluginId: string): boolean;
  getInstalled(pluginId: string): PluginDescriptor | null;
  /** `buildNumber` null means the running host build. */
  isIncompatible(descriptor: PluginDescriptor, buildNumber: BuildNumber | null): boolean;
  isKnownBroken(descriptor: PluginDescriptor): boolean;
  wasUpdatedThisSession(pluginId: string): boolean;
  markUpdated(pluginId: string, descriptor: PluginDescriptor | null): void;
}

export interface PluginInstaller {
  install(artifactPath: string, displayName: string, overwrite: boolean): Promise<void>;
}

/** Commands run once, in append order, at the next start. No rollback once replayed. */
export interface DeferredActionLog {
  appendDeleteCommand(targetPath: string): void;
  /** Position to return to with `rollbackTo` when staging fails before the session ends. */
  mark(): number;
  rollbackTo(mark: number): void;
}

export interface ManifestReader {
  readManifest(targetPath: string): Promise<PluginDescriptor | null>;
}

export interface ArchiveExtractor {
  extractAll(archivePath: string, destDir: string): Promise<void>;
}
