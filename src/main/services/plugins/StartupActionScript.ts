import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { Logger } from '@main/services/logging/Logger';
import type { ArchiveExtractor, DeferredActionLog } from '@main/services/plugins/collaborators';

const commandSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('delete'), target: z.string().min(1) }),
  z.object({ kind: z.literal('copy'), source: z.string().min(1), destination: z.string().min(1), overwrite: z.boolean() }),
  z.object({ kind: z.literal('unzip'), source: z.string().min(1), destinationDir: z.string().min(1) })
]);

const scriptSchema = z.object({
  commands: z.array(commandSchema)
});

export type ActionCommand = z.infer<typeof commandSchema>;

export interface ActionScriptReplayReport {
  executed: number;
  skipped: number;
  failed: number;
}

interface StartupActionScriptOptions {
  scriptPath: string;
  archiveExtractor: ArchiveExtractor;
  logger: Logger;
}

/**
 * Filesystem commands recorded during a session and executed at the next start, before any
 * plugin is loaded. Files the running process may still hold open are never touched live.
 */
export class StartupActionScript implements DeferredActionLog {
  private readonly scriptPath: string;
  private readonly archiveExtractor: ArchiveExtractor;
  private readonly logger: Logger;

  constructor(options: StartupActionScriptOptions) {
    this.scriptPath = options.scriptPath;
    this.archiveExtractor = options.archiveExtractor;
    this.logger = options.logger;
  }

  appendDeleteCommand(targetPath: string): void {
    this.append({ kind: 'delete', target: targetPath });
  }

  append(command: ActionCommand): void {
    const commands = this.pending();
    commands.push(command);
    this.persist(commands);
    this.logger.info('plugin.action_script.appended', { ...command });
  }

  mark(): number {
    return this.pending().length;
  }

  /** Drops commands appended after `mark`; used when a stage fails halfway. */
  rollbackTo(mark: number): void {
    const commands = this.pending();
    if (mark < 0 || mark >= commands.length) {
      return;
    }

    const dropped = commands.splice(mark);
    this.persist(commands);
    this.logger.warn('plugin.action_script.rolled_back', { mark, dropped: dropped.length });
  }

  pending(): ActionCommand[] {
    if (!fs.existsSync(this.scriptPath)) {
      return [];
    }

    try {
      const parsed = scriptSchema.safeParse(JSON.parse(fs.readFileSync(this.scriptPath, 'utf-8')));
      if (parsed.success) {
        return parsed.data.commands;
      }
      this.logger.warn('plugin.action_script.invalid', { scriptPath: this.scriptPath });
    } catch (error) {
      this.logger.warn('plugin.action_script.unreadable', {
        scriptPath: this.scriptPath,
        reason: error instanceof Error ? error.message : String(error)
      });
    }

    return [];
  }

  async replay(): Promise<ActionScriptReplayReport> {
    const commands = this.pending();
    const report: ActionScriptReplayReport = { executed: 0, skipped: 0, failed: 0 };
    if (commands.length === 0) {
      fs.rmSync(this.scriptPath, { force: true });
      return report;
    }

    this.logger.info('plugin.action_script.replay_start', { count: commands.length });
    for (const command of commands) {
      try {
        const outcome = await this.execute(command);
        report[outcome] += 1;
      } catch (error) {
        report.failed += 1;
        this.logger.error('plugin.action_script.replay_error', {
          ...command,
          reason: error instanceof Error ? error.message : String(error)
        });
      }
    }

    fs.rmSync(this.scriptPath, { force: true });
    this.logger.info('plugin.action_script.replay_finish', { ...report });
    return report;
  }

  private async execute(command: ActionCommand): Promise<'executed' | 'skipped'> {
    switch (command.kind) {
      case 'delete':
        fs.rmSync(command.target, { recursive: true, force: true });
        return 'executed';
      case 'copy':
        if (!command.overwrite && fs.existsSync(command.destination)) {
          this.logger.warn('plugin.action_script.copy_skipped', { ...command });
          return 'skipped';
        }
        fs.mkdirSync(path.dirname(command.destination), { recursive: true });
        fs.copyFileSync(command.source, command.destination);
        return 'executed';
      case 'unzip':
        await this.archiveExtractor.extractAll(command.source, command.destinationDir);
        return 'executed';
    }
  }

  private persist(commands: ActionCommand[]): void {
    fs.mkdirSync(path.dirname(this.scriptPath), { recursive: true });
    fs.writeFileSync(this.scriptPath, JSON.stringify({ commands }, null, 2), 'utf-8');
  }
}
