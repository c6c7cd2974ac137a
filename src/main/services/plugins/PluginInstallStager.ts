import type { PluginDescriptor } from '@shared/contracts';
import { Logger } from '@main/services/logging/Logger';
import type { DeferredActionLog, PluginInstaller, PluginRegistry } from '@main/services/plugins/collaborators';

export interface PluginStageInput {
  pluginId: string;
  descriptor: PluginDescriptor | null;
  supersededPath: string | null;
  artifactPath: string;
  /** Per-plan download directory, removed after the artifact is installed. */
  workDir: string | null;
  displayName: string;
}

interface PluginInstallStagerOptions {
  actionLog: DeferredActionLog;
  installer: PluginInstaller;
  registry: Pick<PluginRegistry, 'markUpdated'>;
  logger: Logger;
}

export class PluginInstallStager {
  private readonly actionLog: DeferredActionLog;
  private readonly installer: PluginInstaller;
  private readonly registry: Pick<PluginRegistry, 'markUpdated'>;
  private readonly logger: Logger;

  constructor(options: PluginInstallStagerOptions) {
    this.actionLog = options.actionLog;
    this.installer = options.installer;
    this.registry = options.registry;
    this.logger = options.logger;
  }

  async stage(input: PluginStageInput): Promise<void> {
    const mark = this.actionLog.mark();
    try {
      if (input.supersededPath) {
        this.actionLog.appendDeleteCommand(input.supersededPath);
      }

      await this.installer.install(input.artifactPath, input.displayName, true);
      if (input.workDir) {
        this.actionLog.appendDeleteCommand(input.workDir);
      }
    } catch (error) {
      this.actionLog.rollbackTo(mark);
      this.logger.error('plugin.stage.error', {
        pluginId: input.pluginId,
        reason: error instanceof Error ? error.message : String(error)
      });
      throw error;
    }

    this.registry.markUpdated(input.pluginId, input.descriptor);
    this.logger.info('plugin.stage.finish', {
      pluginId: input.pluginId,
      version: input.descriptor?.version ?? null,
      artifactPath: input.artifactPath,
      supersededPath: input.supersededPath
    });
  }
}
