import fs from 'node:fs';
import type { PluginDescriptor } from '@shared/contracts';
import { ContractViolationError } from '@main/services/plugins/errors';
import type { PluginInstallStager } from '@main/services/plugins/PluginInstallStager';

interface StagedPluginInit {
  pluginId: string;
  displayName: string;
  artifactPath: string;
  workDir: string;
  supersededPath: string | null;
  descriptor: PluginDescriptor | null;
  stager: PluginInstallStager;
  onCommitted: () => void;
  onCommitFailed: (error: unknown) => void;
  onDiscarded: () => void;
}

const CONSUMED_LABEL = {
  committed: 'instalado',
  discarded: 'descartado',
  failed: 'descartado apos falha na instalacao'
} as const;

/**
 * A downloaded, validated artifact awaiting installation. Only `prepare()` hands these out, so
 * committing an unstaged plan cannot be expressed; committing twice is a contract violation.
 */
export class StagedPlugin {
  readonly pluginId: string;
  readonly displayName: string;
  readonly artifactPath: string;
  readonly workDir: string;
  readonly supersededPath: string | null;
  readonly descriptor: PluginDescriptor | null;

  private readonly stager: PluginInstallStager;
  private readonly onCommitted: () => void;
  private readonly onCommitFailed: (error: unknown) => void;
  private readonly onDiscarded: () => void;
  private consumed: 'committed' | 'discarded' | 'failed' | null = null;

  constructor(init: StagedPluginInit) {
    this.pluginId = init.pluginId;
    this.displayName = init.displayName;
    this.artifactPath = init.artifactPath;
    this.workDir = init.workDir;
    this.supersededPath = init.supersededPath;
    this.descriptor = init.descriptor;
    this.stager = init.stager;
    this.onCommitted = init.onCommitted;
    this.onCommitFailed = init.onCommitFailed;
    this.onDiscarded = init.onDiscarded;
  }

  get version(): string | null {
    return this.descriptor?.version ?? null;
  }

  isConsumed(): boolean {
    return this.consumed !== null;
  }

  /** On failure the artifact is deleted, the plan moves to `failed` and the error is rethrown. */
  async commit(): Promise<void> {
    this.assertAvailable('commit');
    this.consumed = 'committed';
    try {
      await this.stager.stage({
        pluginId: this.pluginId,
        descriptor: this.descriptor,
        supersededPath: this.supersededPath,
        artifactPath: this.artifactPath,
        workDir: this.workDir,
        displayName: this.displayName
      });
    } catch (error) {
      this.consumed = 'failed';
      this.removeWorkDir();
      this.onCommitFailed(error);
      throw error;
    }
    this.onCommitted();
  }

  /** Abandons the staged artifact and deletes its download directory. */
  discard(): void {
    this.assertAvailable('discard');
    this.consumed = 'discarded';
    this.removeWorkDir();
    this.onDiscarded();
  }

  private removeWorkDir(): void {
    fs.rmSync(this.workDir, { recursive: true, force: true });
  }

  private assertAvailable(operation: 'commit' | 'discard'): void {
    if (this.consumed !== null) {
      throw new ContractViolationError(
        `${operation} invalido para o plugin ${this.pluginId}: artefato ja ${CONSUMED_LABEL[this.consumed]}.`
      );
    }
    if (!fs.existsSync(this.artifactPath)) {
      throw new ContractViolationError(`Artefato staged ausente para o plugin ${this.pluginId}: ${this.artifactPath}`);
    }
  }
}
