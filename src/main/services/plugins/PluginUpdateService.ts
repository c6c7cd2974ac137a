import type { PluginUpdateReport } from '@shared/contracts';
import { Logger } from '@main/services/logging/Logger';
import { ContractViolationError } from '@main/services/plugins/errors';
import type { PluginDownloader, PluginPrepareResult } from '@main/services/plugins/PluginDownloader';

interface PluginUpdateServiceOptions {
  logger: Logger;
  /** Receives user-facing failure messages; rejections are only logged. */
  notify?: (message: string) => void;
}

export interface PluginUpdateRunOptions {
  signal?: AbortSignal;
}

export class PluginUpdateService {
  private readonly logger: Logger;
  private readonly notify: ((message: string) => void) | null;

  constructor(options: PluginUpdateServiceOptions) {
    this.logger = options.logger;
    this.notify = options.notify ?? null;
  }

  async updateAll(downloaders: PluginDownloader[], options: PluginUpdateRunOptions = {}): Promise<PluginUpdateReport> {
    this.logger.info('plugin.update.start', {
      count: downloaders.length,
      pluginIds: downloaders.map((downloader) => downloader.pluginId)
    });

    const prepared = await Promise.all(
      downloaders.map(async (downloader) => ({
        downloader,
        result: await downloader.prepare({ signal: options.signal })
      }))
    );

    const report: PluginUpdateReport = {
      installed: [],
      rejected: [],
      failed: []
    };

    for (const { downloader, result } of prepared) {
      await this.settle(downloader, result, report);
    }

    this.logger.info('plugin.update.finish', {
      installed: report.installed.length,
      rejected: report.rejected.length,
      failed: report.failed.length
    });
    return report;
  }

  private async settle(downloader: PluginDownloader, result: PluginPrepareResult, report: PluginUpdateReport): Promise<void> {
    if (result.status === 'rejected') {
      report.rejected.push({
        pluginId: downloader.pluginId,
        reason: result.reason,
        message: result.message
      });
      return;
    }

    if (result.status === 'failed') {
      report.failed.push({
        pluginId: downloader.pluginId,
        code: result.code,
        message: result.message
      });
      if (result.code !== 'cancelled') {
        this.notify?.(result.notice);
      }
      return;
    }

    try {
      await result.plugin.commit();
      report.installed.push({
        pluginId: downloader.pluginId,
        version: result.plugin.version,
        artifactPath: result.plugin.artifactPath
      });
    } catch (error) {
      if (error instanceof ContractViolationError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error('plugin.update.install_error', {
        pluginId: downloader.pluginId,
        reason
      });
      report.failed.push({
        pluginId: downloader.pluginId,
        code: 'install_failed',
        message: reason
      });
      this.notify?.(`Plugin ${downloader.getPluginName()} nao foi instalado: ${reason}`);
    }
  }
}
