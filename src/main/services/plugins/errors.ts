import type { PluginDownloadErrorCode } from '@shared/contracts';

export class PluginDownloadError extends Error {
  readonly code: PluginDownloadErrorCode;

  constructor(code: PluginDownloadErrorCode, message: string) {
    super(message);
    this.name = 'PluginDownloadError';
    this.code = code;
  }
}

/** Caller broke the plan state machine. Never caught inside this subsystem. */
export class ContractViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContractViolationError';
  }
}
