import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import type {
  PluginCatalogEntry,
  PluginDescriptor,
  PluginDownloadErrorCode,
  PluginDownloadProgress,
  PluginPlanPhase,
  PluginRejectionReason
} from '@shared/contracts';
import { Logger } from '@main/services/logging/Logger';
import type { BuildNumber } from '@main/services/plugins/BuildNumber';
import type { PluginRegistry } from '@main/services/plugins/collaborators';
import { PluginDownloadError } from '@main/services/plugins/errors';
import type { PluginArtifactFetcher } from '@main/services/plugins/PluginArtifactFetcher';
import type { PluginDescriptorExtractor } from '@main/services/plugins/PluginDescriptorExtractor';
import type { PluginInstallStager } from '@main/services/plugins/PluginInstallStager';
import { getHostUrl, getRepositoryUrl } from '@main/services/plugins/PluginRepositoryUrls';
import type { PluginRepositoryOptions } from '@main/services/plugins/PluginRepositoryUrls';
import { PluginVersionArbiter } from '@main/services/plugins/PluginVersionArbiter';
import { StagedPlugin } from '@main/services/plugins/StagedPlugin';

export interface PluginDownloaderContext {
  registry: PluginRegistry;
  fetcher: PluginArtifactFetcher;
  extractor: PluginDescriptorExtractor;
  stager: PluginInstallStager;
  logger: Logger;
  /** Each plan downloads into its own `plan-<uuid>` directory below this one. */
  tempDir: string;
  /** First-launch mode: installed plugins are not treated as superseded. */
  startupWizardMode?: boolean;
}

export interface PluginDownloaderOptions {
  pluginId: string;
  url: string;
  version?: string | null;
  fileName?: string | null;
  pluginName?: string | null;
  buildNumber?: BuildNumber | null;
  forceHttps?: boolean;
  catalogDescriptor?: PluginDescriptor | null;
}

export interface FromDescriptorOptions {
  host?: string | null;
  buildNumber?: BuildNumber | null;
  repository?: PluginRepositoryOptions;
  forceHttps?: boolean;
}

export interface PluginPrepareOptions {
  signal?: AbortSignal;
  onProgress?: (progress: PluginDownloadProgress) => void;
}

export type PluginPrepareResult =
  | { status: 'staged'; plugin: StagedPlugin }
  | { status: 'rejected'; reason: PluginRejectionReason; message: string }
  | { status: 'failed'; code: PluginDownloadErrorCode; message: string; notice: string };

type PlanState =
  | { phase: 'fresh' }
  | { phase: 'staged'; staged: StagedPlugin }
  | { phase: 'accepted'; staged: StagedPlugin }
  | { phase: 'rejected'; reason: PluginRejectionReason; message: string }
  | { phase: 'failed'; code: PluginDownloadErrorCode; message: string };

/**
 * One update of one plugin: download, inspect, decide, then stage for install at next start.
 * Each instance is driven by a single caller; separate plugins get separate instances.
 */
export class PluginDownloader {
  readonly pluginId: string;
  readonly url: string;
  readonly buildNumber: BuildNumber | null;
  readonly forceHttps: boolean;

  private version: string | null;
  private readonly fileNameHint: string | null;
  private downloadedFileName: string | null = null;
  private pluginName: string | null;
  private description: string | null;
  private dependencies: string[];
  private readonly catalogDescriptor: PluginDescriptor | null;
  private readonly context: PluginDownloaderContext;
  private readonly arbiter: PluginVersionArbiter;
  private state: PlanState = { phase: 'fresh' };
  private inFlight: Promise<PluginPrepareResult> | null = null;

  constructor(options: PluginDownloaderOptions, context: PluginDownloaderContext) {
    this.pluginId = options.pluginId;
    this.url = options.url;
    this.version = options.version ?? null;
    this.fileNameHint = options.fileName ?? null;
    this.pluginName = options.pluginName ?? null;
    this.buildNumber = options.buildNumber ?? null;
    this.forceHttps = options.forceHttps ?? false;
    this.catalogDescriptor = options.catalogDescriptor ?? null;
    this.description = this.catalogDescriptor?.description ?? null;
    this.dependencies = this.catalogDescriptor?.dependencies.slice() ?? [];
    this.context = context;
    this.arbiter = new PluginVersionArbiter(context.registry);
  }

  static fromDescriptor(
    descriptor: PluginDescriptor,
    context: PluginDownloaderContext,
    options: FromDescriptorOptions = {}
  ): PluginDownloader {
    return new PluginDownloader(
      {
        pluginId: descriptor.id,
        url: resolveDescriptorUrl(descriptor, options),
        version: descriptor.version,
        pluginName: descriptor.name,
        buildNumber: options.buildNumber ?? null,
        forceHttps: options.forceHttps,
        catalogDescriptor: descriptor
      },
      context
    );
  }

  get phase(): PluginPlanPhase {
    return this.state.phase;
  }

  getPluginVersion(): string | null {
    return this.version;
  }

  getFileName(): string {
    return this.downloadedFileName ?? this.fileNameHint ?? this.url.slice(this.url.lastIndexOf('/') + 1);
  }

  getPluginName(): string {
    return this.pluginName ?? path.parse(this.getFileName()).name;
  }

  async prepare(options: PluginPrepareOptions = {}): Promise<PluginPrepareResult> {
    if (this.state.phase === 'staged') {
      this.context.logger.debug('plugin.prepare.skipped_staged', { pluginId: this.pluginId });
      return { status: 'staged', plugin: this.state.staged };
    }
    if (this.state.phase === 'accepted') {
      return {
        status: 'rejected',
        reason: 'already_processed',
        message: `Plugin ${this.pluginId} ja foi instalado por este plano.`
      };
    }
    if (this.inFlight) {
      return this.inFlight;
    }

    this.inFlight = this.runPrepare(options);
    try {
      return await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  toCatalogEntry(host: string | null = null): PluginCatalogEntry {
    if (this.catalogDescriptor) {
      return {
        id: this.catalogDescriptor.id,
        name: this.catalogDescriptor.name,
        version: this.catalogDescriptor.version,
        repositoryName: host,
        downloadUrl: this.catalogDescriptor.url ?? this.url,
        dependencies: this.catalogDescriptor.dependencies.slice(),
        description: this.catalogDescriptor.description
      };
    }

    return {
      id: this.pluginId,
      name: this.getPluginName(),
      version: this.version,
      repositoryName: host,
      downloadUrl: this.url,
      dependencies: this.dependencies.slice(),
      description: this.description
    };
  }

  private async runPrepare(options: PluginPrepareOptions): Promise<PluginPrepareResult> {
    const { registry, logger } = this.context;
    logger.info('plugin.prepare.start', {
      pluginId: this.pluginId,
      url: this.url,
      version: this.version
    });

    let installed: PluginDescriptor | null = null;
    if (!this.context.startupWizardMode && registry.isInstalled(this.pluginId)) {
      installed = registry.getInstalled(this.pluginId);
      if (installed && this.version !== null && this.arbiter.compare(this.version, installed) <= 0) {
        return this.reject(
          'incompatible_version',
          `Plugin ${this.pluginId}: versao instalada ${installed.version} ja atende a candidata ${this.version}.`,
          null
        );
      }
    }

    const workDir = path.join(this.context.tempDir, `plan-${crypto.randomUUID()}`);
    let artifactPath: string;
    try {
      artifactPath = await this.context.fetcher.fetch({
        url: this.url,
        destinationDir: workDir,
        forceHttps: this.forceHttps,
        fileName: this.fileNameHint,
        signal: options.signal,
        onProgress: options.onProgress
      });
    } catch (error) {
      removeWorkDir(workDir);
      return this.fail(error);
    }
    this.downloadedFileName = path.basename(artifactPath);

    let descriptor: PluginDescriptor | null;
    try {
      descriptor = await this.context.extractor.extract(artifactPath);
    } catch (error) {
      removeWorkDir(workDir);
      return this.fail(error);
    }

    if (!descriptor) {
      // Artifact accepted without a descriptor: no version or compatibility check is possible.
      logger.warn('plugin.prepare.descriptor_missing', {
        pluginId: this.pluginId,
        artifactPath
      });
      return this.stage(artifactPath, workDir, installed, this.catalogDescriptor);
    }

    if (registry.wasUpdatedThisSession(descriptor.id)) {
      return this.reject(
        'already_processed',
        `Plugin ${descriptor.id} ja foi atualizado nesta sessao.`,
        workDir
      );
    }

    this.version = descriptor.version;
    this.pluginName = descriptor.name;
    this.description = descriptor.description;
    this.dependencies = descriptor.dependencies.slice();

    if (installed && this.arbiter.compare(descriptor.version, installed) <= 0) {
      return this.reject(
        'incompatible_version',
        `Plugin ${this.pluginId}: versao instalada ${installed.version} ja atende a baixada ${descriptor.version}.`,
        workDir
      );
    }

    if (registry.isIncompatible(descriptor, this.buildNumber)) {
      return this.reject(
        'incompatible_platform',
        `Plugin ${this.pluginId} incompativel com a instalacao atual (since: ${descriptor.sinceBuild ?? '-'} until: ${descriptor.untilBuild ?? '-'}).`,
        workDir
      );
    }

    return this.stage(artifactPath, workDir, installed, descriptor);
  }

  private stage(
    artifactPath: string,
    workDir: string,
    installed: PluginDescriptor | null,
    descriptor: PluginDescriptor | null
  ): PluginPrepareResult {
    const staged = new StagedPlugin({
      pluginId: this.pluginId,
      displayName: this.getPluginName(),
      artifactPath,
      workDir,
      supersededPath: installed?.path ?? null,
      descriptor,
      stager: this.context.stager,
      onCommitted: () => {
        this.state = { phase: 'accepted', staged };
        this.context.logger.info('plugin.commit.finish', {
          pluginId: this.pluginId,
          version: this.version
        });
      },
      onCommitFailed: (error) => {
        const message = error instanceof Error ? error.message : String(error);
        this.state = { phase: 'failed', code: 'io_failure', message };
        this.context.logger.warn('plugin.commit.failed', {
          pluginId: this.pluginId,
          reason: message
        });
      },
      onDiscarded: () => {
        this.state = { phase: 'fresh' };
        this.context.logger.info('plugin.prepare.discarded', { pluginId: this.pluginId, artifactPath });
      }
    });

    this.state = { phase: 'staged', staged };
    this.context.logger.info('plugin.prepare.staged', {
      pluginId: this.pluginId,
      version: this.version,
      artifactPath,
      supersededPath: staged.supersededPath
    });
    return { status: 'staged', plugin: staged };
  }

  private reject(reason: PluginRejectionReason, message: string, workDir: string | null): PluginPrepareResult {
    if (workDir) {
      removeWorkDir(workDir);
    }

    this.state = { phase: 'rejected', reason, message };
    this.context.logger.info('plugin.prepare.rejected', {
      pluginId: this.pluginId,
      reason,
      message
    });
    return { status: 'rejected', reason, message };
  }

  private fail(error: unknown): PluginPrepareResult {
    const code: PluginDownloadErrorCode = error instanceof PluginDownloadError ? error.code : 'io_failure';
    const message = error instanceof Error ? error.message : String(error);

    this.state = { phase: 'failed', code, message };
    this.context.logger.warn('plugin.prepare.failed', {
      pluginId: this.pluginId,
      code,
      reason: message
    });
    return {
      status: 'failed',
      code,
      message,
      notice: `Plugin ${this.getPluginName()} nao foi instalado: ${message}`
    };
  }
}

function removeWorkDir(workDir: string): void {
  fs.rmSync(workDir, { recursive: true, force: true });
}

function resolveDescriptorUrl(descriptor: PluginDescriptor, options: FromDescriptorOptions): string {
  if (options.host) {
    if (!descriptor.url) {
      throw new Error(`Plugin ${descriptor.id} sem URL de download para o host ${options.host}.`);
    }
    return getHostUrl(options.host, descriptor.url);
  }

  if (!options.repository) {
    throw new Error(`Plugin ${descriptor.id}: informe host ou repositorio para montar a URL de download.`);
  }

  return getRepositoryUrl(descriptor.id, {
    ...options.repository,
    build: options.buildNumber?.asString() ?? options.repository.build
  });
}
