const ABSOLUTE_URL_PATTERN = /^[a-z][a-z0-9+.-]*:/i;

export interface PluginRepositoryOptions {
  downloadUrl: string;
  installationId: string;
  build: string;
}

export function getRepositoryUrl(pluginId: string, repository: PluginRepositoryOptions): string {
  const url = new URL(repository.downloadUrl);
  url.searchParams.append('action', 'download');
  url.searchParams.append('id', pluginId);
  url.searchParams.append('build', repository.build);
  url.searchParams.append('uuid', repository.installationId);
  return url.toString();
}

/** Absolute plugin URLs are kept as published; relative ones resolve against the host. */
export function getHostUrl(host: string, pluginUrl: string): string {
  if (ABSOLUTE_URL_PATTERN.test(pluginUrl)) {
    return pluginUrl;
  }

  return new URL(pluginUrl, host).toString();
}
