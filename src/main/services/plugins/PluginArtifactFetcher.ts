import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import type { PluginDownloadProgress } from '@shared/contracts';
import { Logger } from '@main/services/logging/Logger';
import { PluginDownloadError } from '@main/services/plugins/errors';
import { isValidFileName } from '@main/services/plugins/pathSafety';

export interface PluginArtifactFetchRequest {
  url: string;
  destinationDir: string;
  forceHttps: boolean;
  /** Known file name; skips server-side name resolution. */
  fileName?: string | null;
  signal?: AbortSignal;
  onProgress?: (progress: PluginDownloadProgress) => void;
}

interface PluginArtifactFetcherOptions {
  logger: Logger;
  userAgent?: string;
  maxRedirects?: number;
}

interface OpenedConnection {
  response: Response;
  resolvedUrl: string;
}

const FILENAME_DIRECTIVE = 'filename=';
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export class PluginArtifactFetcher {
  private readonly logger: Logger;
  private readonly userAgent: string;
  private readonly maxRedirects: number;

  constructor(options: PluginArtifactFetcherOptions) {
    this.logger = options.logger;
    this.userAgent = options.userAgent ?? 'PluginUpdater/0.1';
    this.maxRedirects = Number.isFinite(options.maxRedirects) ? Math.max(0, Math.trunc(options.maxRedirects ?? 10)) : 10;
  }

  async fetch(request: PluginArtifactFetchRequest): Promise<string> {
    throwIfCancelled(request.signal);

    try {
      fs.mkdirSync(request.destinationDir, { recursive: true });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new PluginDownloadError(
        'io_failure',
        `Nao foi possivel criar o diretorio temporario ${request.destinationDir}: ${reason}`
      );
    }

    const tempPath = path.join(request.destinationDir, `plugin_${crypto.randomUUID()}_download`);
    this.logger.info('plugin.fetch.start', {
      url: request.url,
      forceHttps: request.forceHttps
    });

    try {
      const { response, resolvedUrl } = await this.openConnection(request.url, request.forceHttps, request.signal);
      const receivedBytes = await this.saveToFile(response, tempPath, request.signal, request.onProgress);

      const fileName =
        request.fileName ?? guessFileName(response.headers.get('content-disposition'), resolvedUrl, request.url);
      if (!isValidFileName(fileName)) {
        throw new PluginDownloadError('validation_failure', `Nome de arquivo invalido retornado pelo servidor: ${fileName}`);
      }

      const targetPath = path.join(request.destinationDir, fileName);
      renameOrThrow(tempPath, targetPath);
      this.logger.info('plugin.fetch.finish', {
        url: request.url,
        resolvedUrl,
        fileName,
        receivedBytes
      });
      return targetPath;
    } catch (error) {
      fs.rmSync(tempPath, { force: true });
      const failure = toDownloadError(error, request.signal);
      this.logger.warn('plugin.fetch.error', {
        url: request.url,
        code: failure.code,
        reason: failure.message
      });
      throw failure;
    }
  }

  private async openConnection(url: string, forceHttps: boolean, signal?: AbortSignal): Promise<OpenedConnection> {
    let current = parseUrl(url);

    for (let hop = 0; ; hop += 1) {
      assertTransportAllowed(current, forceHttps);
      throwIfCancelled(signal);

      const response = await fetch(current.toString(), {
        method: 'GET',
        redirect: 'manual',
        signal,
        headers: {
          Accept: 'application/octet-stream, */*',
          'Accept-Encoding': 'identity',
          'User-Agent': this.userAgent
        }
      });

      if (REDIRECT_STATUSES.has(response.status)) {
        await response.body?.cancel();
        const location = response.headers.get('location');
        if (!location) {
          throw new PluginDownloadError('transport_failure', `Redirecionamento HTTP ${response.status} sem Location para ${current.toString()}`);
        }
        if (hop >= this.maxRedirects) {
          throw new PluginDownloadError('transport_failure', `Excesso de redirecionamentos a partir de ${url}`);
        }

        const next = parseUrl(location, current);
        this.logger.debug('plugin.fetch.redirect', {
          from: current.toString(),
          to: next.toString(),
          status: response.status
        });
        current = next;
        continue;
      }

      if (!response.ok) {
        await response.body?.cancel();
        throw new PluginDownloadError('transport_failure', `HTTP ${response.status} para ${current.toString()}`);
      }

      return {
        response,
        resolvedUrl: current.toString()
      };
    }
  }

  private async saveToFile(
    response: Response,
    targetPath: string,
    signal: AbortSignal | undefined,
    onProgress: ((progress: PluginDownloadProgress) => void) | undefined
  ): Promise<number> {
    const totalBytes = parseContentLength(response.headers.get('content-length'));
    const handle = await fs.promises.open(targetPath, 'wx').catch((error: unknown) => {
      const reason = error instanceof Error ? error.message : String(error);
      throw new PluginDownloadError('io_failure', `Nao foi possivel criar ${targetPath}: ${reason}`);
    });

    let receivedBytes = 0;
    try {
      if (!response.body) {
        return receivedBytes;
      }

      const reader = response.body.getReader();
      const onAbort = (): void => {
        reader.cancel().catch((error: unknown) => {
          this.logger.debug('plugin.fetch.cancel_error', {
            reason: error instanceof Error ? error.message : String(error)
          });
        });
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      try {
        for (;;) {
          const chunk = await reader.read().catch((error: unknown) => {
            throwIfCancelled(signal);
            const reason = error instanceof Error ? error.message : String(error);
            throw new PluginDownloadError('transport_failure', `Download interrompido: ${reason}`);
          });
          throwIfCancelled(signal);
          if (chunk.done) {
            break;
          }

          const bytes: Uint8Array = chunk.value;
          await handle.write(bytes).catch((error: unknown) => {
            const reason = error instanceof Error ? error.message : String(error);
            throw new PluginDownloadError('io_failure', `Falha ao gravar ${targetPath}: ${reason}`);
          });
          receivedBytes += bytes.byteLength;
          onProgress?.({ receivedBytes, totalBytes });
        }
      } finally {
        signal?.removeEventListener('abort', onAbort);
      }

      return receivedBytes;
    } finally {
      await handle.close();
    }
  }
}

/**
 * Order: `Content-Disposition` filename, then the last segment of the resolved URL when it
 * is non-empty and carries no query, then the last segment of the requested URL.
 */
export function guessFileName(contentDisposition: string | null, resolvedUrl: string, requestedUrl: string): string {
  const fromHeader = fileNameFromContentDisposition(contentDisposition);
  if (fromHeader !== null) {
    return fromHeader;
  }

  const fromResolved = lastUrlSegment(resolvedUrl);
  if (fromResolved.length > 0 && !fromResolved.includes('?')) {
    return fromResolved;
  }

  return lastUrlSegment(requestedUrl);
}

export function fileNameFromContentDisposition(header: string | null): string | null {
  if (!header) {
    return null;
  }

  const start = header.indexOf(FILENAME_DIRECTIVE);
  if (start < 0) {
    return null;
  }

  const end = header.indexOf(';', start);
  let value = header.slice(start + FILENAME_DIRECTIVE.length, end > 0 ? end : header.length).trim();
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    value = value.slice(1, -1);
  }

  return value;
}

function lastUrlSegment(url: string): string {
  return url.slice(url.lastIndexOf('/') + 1);
}

function parseUrl(value: string, base?: URL): URL {
  try {
    return new URL(value, base);
  } catch {
    throw new PluginDownloadError('transport_failure', `URL invalida: ${value}`);
  }
}

function assertTransportAllowed(url: URL, forceHttps: boolean): void {
  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new PluginDownloadError('transport_failure', `Protocolo nao suportado: ${url.protocol}`);
  }
  if (forceHttps && url.protocol !== 'https:') {
    throw new PluginDownloadError('transport_failure', `Conexao sem criptografia recusada: ${url.toString()}`);
  }
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new PluginDownloadError('cancelled', 'Download cancelado.');
  }
}

function toDownloadError(error: unknown, signal: AbortSignal | undefined): PluginDownloadError {
  if (error instanceof PluginDownloadError) {
    return error;
  }
  if (signal?.aborted) {
    return new PluginDownloadError('cancelled', 'Download cancelado.');
  }

  const reason = error instanceof Error ? describeNetworkError(error) : String(error);
  return new PluginDownloadError('transport_failure', reason);
}

function describeNetworkError(error: Error): string {
  const cause = error.cause;
  if (cause instanceof Error && cause.message && cause.message !== error.message) {
    return `${error.message}: ${cause.message}`;
  }

  return error.message;
}

function renameOrThrow(from: string, to: string): void {
  if (fs.existsSync(to)) {
    throw new PluginDownloadError('io_failure', `Arquivo de destino ja existe: ${to}`);
  }
  try {
    fs.renameSync(from, to);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PluginDownloadError('io_failure', `Falha ao renomear download para ${to}: ${reason}`);
  }
}

function parseContentLength(value: string | null): number | null {
  if (!value || !/^\d+$/.test(value.trim())) {
    return null;
  }

  return Number(value.trim());
}
