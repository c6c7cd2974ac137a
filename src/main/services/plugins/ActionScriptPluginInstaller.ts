import path from 'node:path';
import { Logger } from '@main/services/logging/Logger';
import type { PluginInstaller } from '@main/services/plugins/collaborators';
import { isPathInside, isValidFileName } from '@main/services/plugins/pathSafety';
import type { StartupActionScript } from '@main/services/plugins/StartupActionScript';

interface ActionScriptPluginInstallerOptions {
  pluginsDir: string;
  actionScript: StartupActionScript;
  logger: Logger;
}

export class ActionScriptPluginInstaller implements PluginInstaller {
  private readonly pluginsDir: string;
  private readonly actionScript: StartupActionScript;
  private readonly logger: Logger;

  constructor(options: ActionScriptPluginInstallerOptions) {
    this.pluginsDir = options.pluginsDir;
    this.actionScript = options.actionScript;
    this.logger = options.logger;
  }

  async install(artifactPath: string, displayName: string, overwrite: boolean): Promise<void> {
    if (artifactPath.toLowerCase().endsWith('.zip')) {
      if (overwrite) {
        this.actionScript.append({ kind: 'delete', target: this.resolvePluginTarget(displayName) });
      }
      this.actionScript.append({ kind: 'unzip', source: artifactPath, destinationDir: this.pluginsDir });
    } else {
      this.actionScript.append({
        kind: 'copy',
        source: artifactPath,
        destination: this.resolvePluginTarget(path.basename(artifactPath)),
        overwrite
      });
    }

    // the download is adopted by the script and removed once installed
    this.actionScript.append({ kind: 'delete', target: artifactPath });
    this.logger.info('plugin.install.scheduled', {
      artifactPath,
      displayName,
      overwrite
    });
  }

  /** `name` comes from the downloaded manifest or file name; it must stay one segment below `pluginsDir`. */
  private resolvePluginTarget(name: string): string {
    const target = path.join(this.pluginsDir, name);
    if (!isValidFileName(name) || !isPathInside(this.pluginsDir, target)) {
      throw new Error(`Nome de plugin invalido para instalacao: ${name}`);
    }
    return target;
  }
}
