import path from 'node:path';
import type { PluginDescriptor, UpdaterConfig } from '@shared/contracts';
import { InstallationIdStore } from '@main/services/config/InstallationIdStore';
import { UpdaterConfigStore } from '@main/services/config/UpdaterConfigStore';
import { Logger, parseLogLevel } from '@main/services/logging/Logger';
import { ActionScriptPluginInstaller } from '@main/services/plugins/ActionScriptPluginInstaller';
import { InstalledPluginRegistry } from '@main/services/plugins/InstalledPluginRegistry';
import { PluginArtifactFetcher } from '@main/services/plugins/PluginArtifactFetcher';
import { PluginDescriptorExtractor } from '@main/services/plugins/PluginDescriptorExtractor';
import { PluginDownloader } from '@main/services/plugins/PluginDownloader';
import type { PluginDownloaderContext, PluginDownloaderOptions } from '@main/services/plugins/PluginDownloader';
import { PluginInstallStager } from '@main/services/plugins/PluginInstallStager';
import { PluginManifestReader } from '@main/services/plugins/PluginManifestReader';
import { PluginUpdateService } from '@main/services/plugins/PluginUpdateService';
import { StartupActionScript } from '@main/services/plugins/StartupActionScript';
import type { ActionScriptReplayReport } from '@main/services/plugins/StartupActionScript';
import { ZipArchiveExtractor } from '@main/services/plugins/ZipArchiveExtractor';

export interface PluginUpdaterOptions {
  notify?: (message: string) => void;
  logMirrorFilePath?: string | null;
}

export interface PluginUpdater {
  config: UpdaterConfig;
  logger: Logger;
  registry: InstalledPluginRegistry;
  actionScript: StartupActionScript;
  service: PluginUpdateService;
  startupReplay: ActionScriptReplayReport;
  createDownloader(options: Omit<PluginDownloaderOptions, 'buildNumber' | 'forceHttps'>): PluginDownloader;
  downloaderForDescriptor(descriptor: PluginDescriptor, host?: string | null): PluginDownloader;
}

/**
 * Wires the updater under `baseDir`. Commands left by the previous session run first, before
 * the installed plugins are scanned.
 */
export async function createPluginUpdater(baseDir: string, options: PluginUpdaterOptions = {}): Promise<PluginUpdater> {
  const logger = new Logger(baseDir, {
    minLevel: parseLogLevel(process.env.PLUGIN_UPDATER_LOG_LEVEL) ?? 'info',
    mirrorFilePath: options.logMirrorFilePath ?? readOptionalEnv('PLUGIN_UPDATER_LOG_MIRROR')
  });
  const configStore = new UpdaterConfigStore(baseDir);
  const installationIdStore = new InstallationIdStore(baseDir);
  const config = configStore.get();
  const buildNumber = configStore.buildNumber();

  const pluginsDir = path.join(baseDir, 'plugins');
  const tempDir = path.join(baseDir, 'plugins-temp');
  const archiveExtractor = new ZipArchiveExtractor();
  const manifestReader = new PluginManifestReader(logger);

  const actionScript = new StartupActionScript({
    scriptPath: path.join(baseDir, 'startup', 'action-script.json'),
    archiveExtractor,
    logger
  });
  const startupReplay = await actionScript.replay();

  const registry = await InstalledPluginRegistry.load({
    pluginsDir,
    manifestReader,
    logger,
    currentBuild: buildNumber
  });
  const context: PluginDownloaderContext = {
    registry,
    fetcher: new PluginArtifactFetcher({ logger }),
    extractor: new PluginDescriptorExtractor({ manifestReader, archiveExtractor, logger, tempRoot: tempDir }),
    stager: new PluginInstallStager({
      actionLog: actionScript,
      installer: new ActionScriptPluginInstaller({ pluginsDir, actionScript, logger }),
      registry,
      logger
    }),
    logger,
    tempDir,
    startupWizardMode: config.startupWizardMode
  };
  const service = new PluginUpdateService({ logger, notify: options.notify });

  logger.info('updater.bootstrap', {
    baseDir,
    buildNumber: config.buildNumber,
    forceHttps: config.forceHttps,
    installedPlugins: registry.list().length,
    startupReplay
  });

  return {
    config,
    logger,
    registry,
    actionScript,
    service,
    startupReplay,
    createDownloader: (downloaderOptions) =>
      new PluginDownloader({ ...downloaderOptions, buildNumber, forceHttps: config.forceHttps }, context),
    downloaderForDescriptor: (descriptor, host = null) =>
      PluginDownloader.fromDescriptor(descriptor, context, {
        host,
        buildNumber,
        forceHttps: config.forceHttps,
        repository: {
          downloadUrl: config.pluginsDownloadUrl,
          installationId: installationIdStore.get(),
          build: config.buildNumber
        }
      })
  };
}

function readOptionalEnv(name: string): string | null {
  const value = process.env[name]?.trim();
  return value ? value : null;
}
