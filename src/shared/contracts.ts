export interface PluginDescriptor {
  id: string;
  name: string;
  version: string;
  description: string | null;
  dependencies: string[];
  sinceBuild: string | null;
  untilBuild: string | null;
  url: string | null;
  path: string | null;
}

export interface PluginCatalogEntry {
  id: string;
  name: string;
  version: string | null;
  repositoryName: string | null;
  downloadUrl: string;
  dependencies: string[];
  description: string | null;
}

export interface UpdaterConfig {
  pluginsDownloadUrl: string;
  buildNumber: string;
  forceHttps: boolean;
  startupWizardMode: boolean;
}

export type PluginDownloadErrorCode = 'io_failure' | 'transport_failure' | 'cancelled' | 'validation_failure';
export type PluginRejectionReason = 'incompatible_version' | 'incompatible_platform' | 'already_processed';
export type PluginPlanPhase = 'fresh' | 'staged' | 'accepted' | 'rejected' | 'failed';

export interface PluginDownloadProgress {
  receivedBytes: number;
  totalBytes: number | null;
}

export interface PluginUpdateInstalledItem {
  pluginId: string;
  version: string | null;
  artifactPath: string;
}

export interface PluginUpdateRejectedItem {
  pluginId: string;
  reason: PluginRejectionReason;
  message: string;
}

export interface PluginUpdateFailedItem {
  pluginId: string;
  code: PluginDownloadErrorCode | 'install_failed';
  message: string;
}

export interface PluginUpdateReport {
  installed: PluginUpdateInstalledItem[];
  rejected: PluginUpdateRejectedItem[];
  failed: PluginUpdateFailedItem[];
}
