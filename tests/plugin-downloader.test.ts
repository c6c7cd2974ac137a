import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import type { PluginDescriptor } from '@shared/contracts';
import { BuildNumber } from '@main/services/plugins/BuildNumber';
import type { PluginRegistry } from '@main/services/plugins/collaborators';
import { ContractViolationError } from '@main/services/plugins/errors';
import { PluginArtifactFetcher } from '@main/services/plugins/PluginArtifactFetcher';
import { PluginDescriptorExtractor } from '@main/services/plugins/PluginDescriptorExtractor';
import { PluginDownloader } from '@main/services/plugins/PluginDownloader';
import type { PluginDownloaderContext } from '@main/services/plugins/PluginDownloader';
import { PluginInstallStager } from '@main/services/plugins/PluginInstallStager';
import { PluginManifestReader } from '@main/services/plugins/PluginManifestReader';
import { ZipArchiveExtractor } from '@main/services/plugins/ZipArchiveExtractor';
import { binaryResponse, buildPluginFolderZip, createLoggerMock, descriptor } from './helpers/plugin-archives';
import type { ManifestFields } from './helpers/plugin-archives';

const tempDirs: string[] = [];

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();

  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

class FakeRegistry implements PluginRegistry {
  readonly updated = new Map<string, PluginDescriptor | null>();

  constructor(
    private readonly installed: PluginDescriptor[] = [],
    private readonly broken: string[] = []
  ) {}

  isInstalled(pluginId: string): boolean {
    return this.installed.some((item) => item.id === pluginId);
  }

  getInstalled(pluginId: string): PluginDescriptor | null {
    return this.installed.find((item) => item.id === pluginId) ?? null;
  }

  isIncompatible(candidate: PluginDescriptor, buildNumber: BuildNumber | null): boolean {
    const until = candidate.untilBuild ? BuildNumber.parse(candidate.untilBuild) : null;
    return Boolean(buildNumber && until && buildNumber.compareTo(until) > 0);
  }

  isKnownBroken(candidate: PluginDescriptor): boolean {
    return this.broken.includes(`${candidate.id}@${candidate.version}`);
  }

  wasUpdatedThisSession(pluginId: string): boolean {
    return this.updated.has(pluginId);
  }

  markUpdated(pluginId: string, updated: PluginDescriptor | null): void {
    this.updated.set(pluginId, updated);
  }
}

function setup(registry: FakeRegistry = new FakeRegistry()) {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'plugin-downloader-'));
  tempDirs.push(dir);

  const logger = createLoggerMock();
  const actionLog = { appendDeleteCommand: vi.fn(), mark: vi.fn(() => 0), rollbackTo: vi.fn() };
  const installer = { install: vi.fn(async () => undefined) };
  const manifestReader = new PluginManifestReader(logger as never);
  const tempDir = path.join(dir, 'plugins-temp');
  const context: PluginDownloaderContext = {
    registry,
    fetcher: new PluginArtifactFetcher({ logger: logger as never }),
    extractor: new PluginDescriptorExtractor({
      manifestReader,
      archiveExtractor: new ZipArchiveExtractor(),
      logger: logger as never,
      tempRoot: path.join(dir, 'extract')
    }),
    stager: new PluginInstallStager({ actionLog, installer, registry, logger: logger as never }),
    logger: logger as never,
    tempDir
  };

  return { dir, tempDir, logger, actionLog, installer, registry, context };
}

async function servePlugin(manifest: ManifestFields) {
  const bytes = await buildPluginFolderZip(manifest.id, manifest);
  const fetchMock = vi.fn(async () => binaryResponse(bytes));
  vi.stubGlobal('fetch', fetchMock as unknown as typeof fetch);
  return fetchMock;
}

const FOO_URL = 'https://plugins.example.invalid/files/foo-1.2.zip';

describe('PluginDownloader', () => {
  it('instala plugin novo sem agendar remocao de versao anterior', async () => {
    const { tempDir, actionLog, installer, registry, context } = setup();
    await servePlugin({ id: 'foo', name: 'Foo', version: '1.2' });

    const downloader = new PluginDownloader({ pluginId: 'foo', url: FOO_URL }, context);
    const result = await downloader.prepare();

    expect(result.status).toBe('staged');
    if (result.status !== 'staged') {
      return;
    }
    const { artifactPath, workDir } = result.plugin;
    expect(path.basename(artifactPath)).toBe('foo-1.2.zip');
    expect(path.dirname(artifactPath)).toBe(workDir);
    expect(path.dirname(workDir)).toBe(tempDir);
    expect(path.basename(workDir)).toMatch(/^plan-[0-9a-f-]{36}$/);
    expect(result.plugin.supersededPath).toBeNull();
    expect(downloader.phase).toBe('staged');

    await result.plugin.commit();

    expect(actionLog.appendDeleteCommand).toHaveBeenCalledTimes(1);
    expect(actionLog.appendDeleteCommand).toHaveBeenCalledWith(workDir);
    expect(installer.install).toHaveBeenCalledWith(artifactPath, 'Foo', true);
    expect(registry.updated.get('foo')?.version).toBe('1.2');
    expect(downloader.phase).toBe('accepted');
    expect(downloader.getPluginVersion()).toBe('1.2');
  });

  it('substitui versao instalada agendando remocao do artefato antigo', async () => {
    const installed = descriptor({ id: 'foo', version: '1.0', path: '/opt/host/plugins/foo' });
    const { actionLog, registry, context } = setup(new FakeRegistry([installed]));
    await servePlugin({ id: 'foo', name: 'Foo', version: '1.2' });

    const downloader = new PluginDownloader({ pluginId: 'foo', url: FOO_URL }, context);
    const result = await downloader.prepare();

    expect(result.status).toBe('staged');
    if (result.status !== 'staged') {
      return;
    }
    await result.plugin.commit();

    expect(actionLog.appendDeleteCommand).toHaveBeenCalledTimes(2);
    expect(actionLog.appendDeleteCommand).toHaveBeenNthCalledWith(1, '/opt/host/plugins/foo');
    expect(actionLog.appendDeleteCommand).toHaveBeenNthCalledWith(2, result.plugin.workDir);
    expect(registry.updated.get('foo')?.version).toBe('1.2');
  });

  it('rejeita antes do download quando a dica de versao nao supera a instalada', async () => {
    const installed = descriptor({ id: 'foo', version: '2.0', path: '/opt/host/plugins/foo' });
    const { tempDir, context } = setup(new FakeRegistry([installed]));
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock as unknown as typeof fetch);

    const downloader = new PluginDownloader({ pluginId: 'foo', url: FOO_URL, version: '1.5' }, context);
    const result = await downloader.prepare();

    expect(result).toEqual({
      status: 'rejected',
      reason: 'incompatible_version',
      message: 'Plugin foo: versao instalada 2.0 ja atende a candidata 1.5.'
    });
    expect(fetchMock).not.toHaveBeenCalled();
    expect(fs.existsSync(tempDir)).toBe(false);
    expect(downloader.phase).toBe('rejected');
  });

  it('aceita versao antiga quando a instalada esta na lista de quebrados', async () => {
    const installed = descriptor({ id: 'foo', version: '2.0', path: '/opt/host/plugins/foo' });
    const { context } = setup(new FakeRegistry([installed], ['foo@2.0']));
    await servePlugin({ id: 'foo', name: 'Foo', version: '1.5' });

    const downloader = new PluginDownloader({ pluginId: 'foo', url: FOO_URL, version: '1.5' }, context);
    const result = await downloader.prepare();

    expect(result.status).toBe('staged');
  });

  it('retorna cancelled sem gravar nada quando cancelado antes da transferencia', async () => {
    const { dir, tempDir, logger, context } = setup();
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock as unknown as typeof fetch);
    const before = fs.readdirSync(dir);
    const controller = new AbortController();
    controller.abort();

    const downloader = new PluginDownloader({ pluginId: 'foo', url: FOO_URL }, context);
    const result = await downloader.prepare({ signal: controller.signal });

    expect(result).toEqual({
      status: 'failed',
      code: 'cancelled',
      message: 'Download cancelado.',
      notice: 'Plugin foo-1.2 nao foi instalado: Download cancelado.'
    });
    expect(fetchMock).not.toHaveBeenCalled();
    expect(fs.existsSync(tempDir)).toBe(false);
    expect(fs.readdirSync(dir)).toEqual(before);
    expect(logger.warn).toHaveBeenCalledWith(
      'plugin.prepare.failed',
      expect.objectContaining({ pluginId: 'foo', code: 'cancelled' })
    );
  });

  it('nao repete download ao chamar prepare duas vezes em plano staged', async () => {
    const { context } = setup();
    const fetchMock = await servePlugin({ id: 'foo', name: 'Foo', version: '1.2' });

    const downloader = new PluginDownloader({ pluginId: 'foo', url: FOO_URL }, context);
    const first = await downloader.prepare();
    const second = await downloader.prepare();

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(first.status).toBe('staged');
    expect(second.status).toBe('staged');
    if (first.status === 'staged' && second.status === 'staged') {
      expect(second.plugin).toBe(first.plugin);
      expect(second.plugin.artifactPath).toBe(first.plugin.artifactPath);
    }
  });

  it('compartilha a mesma execucao entre chamadas concorrentes', async () => {
    const { context } = setup();
    const fetchMock = await servePlugin({ id: 'foo', name: 'Foo', version: '1.2' });

    const downloader = new PluginDownloader({ pluginId: 'foo', url: FOO_URL }, context);
    const [first, second] = await Promise.all([downloader.prepare(), downloader.prepare()]);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(second).toBe(first);
  });

  it('lanca ContractViolationError ao confirmar duas vezes', async () => {
    const { context } = setup();
    await servePlugin({ id: 'foo', name: 'Foo', version: '1.2' });

    const downloader = new PluginDownloader({ pluginId: 'foo', url: FOO_URL }, context);
    const result = await downloader.prepare();
    if (result.status !== 'staged') {
      throw new Error(`esperava staged, obteve ${result.status}`);
    }

    await result.plugin.commit();
    await expect(result.plugin.commit()).rejects.toBeInstanceOf(ContractViolationError);
    await expect(downloader.prepare()).resolves.toEqual({
      status: 'rejected',
      reason: 'already_processed',
      message: 'Plugin foo ja foi instalado por este plano.'
    });
  });

  it('descarta artefato staged e volta ao estado inicial', async () => {
    const { tempDir, context } = setup();
    await servePlugin({ id: 'foo', name: 'Foo', version: '1.2' });

    const downloader = new PluginDownloader({ pluginId: 'foo', url: FOO_URL }, context);
    const result = await downloader.prepare();
    if (result.status !== 'staged') {
      throw new Error(`esperava staged, obteve ${result.status}`);
    }

    result.plugin.discard();

    expect(fs.readdirSync(tempDir)).toEqual([]);
    expect(downloader.phase).toBe('fresh');
    expect(result.plugin.isConsumed()).toBe(true);
    expect(() => result.plugin.discard()).toThrow(ContractViolationError);
  });

  it('rejeita plugin incompativel com o build e remove o download', async () => {
    const { tempDir, context } = setup();
    await servePlugin({ id: 'foo', name: 'Foo', version: '1.2', untilBuild: '100.*' });

    const downloader = new PluginDownloader(
      { pluginId: 'foo', url: FOO_URL, buildNumber: BuildNumber.parse('120.1') },
      context
    );
    const result = await downloader.prepare();

    expect(result).toEqual({
      status: 'rejected',
      reason: 'incompatible_platform',
      message: 'Plugin foo incompativel com a instalacao atual (since: - until: 100.*).'
    });
    expect(fs.readdirSync(tempDir)).toEqual([]);
  });

  it('rejeita versao baixada que nao supera a instalada', async () => {
    const installed = descriptor({ id: 'foo', version: '1.2', path: '/opt/host/plugins/foo' });
    const { tempDir, context } = setup(new FakeRegistry([installed]));
    await servePlugin({ id: 'foo', name: 'Foo', version: '1.2' });

    const downloader = new PluginDownloader({ pluginId: 'foo', url: FOO_URL }, context);
    const result = await downloader.prepare();

    expect(result).toEqual({
      status: 'rejected',
      reason: 'incompatible_version',
      message: 'Plugin foo: versao instalada 1.2 ja atende a baixada 1.2.'
    });
    expect(fs.readdirSync(tempDir)).toEqual([]);
  });

  it('rejeita plugin ja atualizado nesta sessao', async () => {
    const registry = new FakeRegistry();
    registry.markUpdated('foo', null);
    const { tempDir, context } = setup(registry);
    await servePlugin({ id: 'foo', name: 'Foo', version: '1.2' });

    const downloader = new PluginDownloader({ pluginId: 'foo', url: FOO_URL }, context);
    const result = await downloader.prepare();

    expect(result.status).toBe('rejected');
    if (result.status === 'rejected') {
      expect(result.reason).toBe('already_processed');
    }
    expect(fs.readdirSync(tempDir)).toEqual([]);
  });

  it('aceita artefato sem descritor e registra aviso', async () => {
    const { tempDir, logger, context } = setup();
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => binaryResponse(Buffer.from('binario opaco'))) as unknown as typeof fetch
    );

    const downloader = new PluginDownloader(
      { pluginId: 'opaco', url: 'https://plugins.example.invalid/files/opaco.bin' },
      context
    );
    const result = await downloader.prepare();

    if (result.status !== 'staged') {
      throw new Error(`esperava staged, obteve ${result.status}`);
    }
    expect(result.plugin.descriptor).toBeNull();
    expect(result.plugin.displayName).toBe('opaco');
    expect(path.dirname(path.dirname(result.plugin.artifactPath))).toBe(tempDir);
    expect(logger.warn).toHaveBeenCalledWith('plugin.prepare.descriptor_missing', {
      pluginId: 'opaco',
      artifactPath: result.plugin.artifactPath
    });
  });

  it('reexecuta prepare apos falha de transporte', async () => {
    const { context } = setup();
    const bytes = await buildPluginFolderZip('foo', { id: 'foo', name: 'Foo', version: '1.2' });
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(new Response('indisponivel', { status: 503 }))
      .mockResolvedValueOnce(binaryResponse(bytes));
    vi.stubGlobal('fetch', fetchMock as unknown as typeof fetch);

    const downloader = new PluginDownloader({ pluginId: 'foo', url: FOO_URL }, context);
    const failed = await downloader.prepare();
    expect(failed).toEqual({
      status: 'failed',
      code: 'transport_failure',
      message: `HTTP 503 para ${FOO_URL}`,
      notice: `Plugin foo-1.2 nao foi instalado: HTTP 503 para ${FOO_URL}`
    });
    expect(downloader.phase).toBe('failed');

    const retried = await downloader.prepare();
    expect(retried.status).toBe('staged');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('baixa cada plano em diretorio proprio mesmo com o mesmo nome de arquivo', async () => {
    const registry = new FakeRegistry();
    const { tempDir, context } = setup(registry);
    const fooBytes = await buildPluginFolderZip('foo', { id: 'foo', name: 'Foo', version: '1.2' });
    const barBytes = await buildPluginFolderZip('bar', { id: 'bar', name: 'Bar', version: '3.0' });
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(binaryResponse(fooBytes))
      .mockResolvedValueOnce(binaryResponse(barBytes));
    vi.stubGlobal('fetch', fetchMock as unknown as typeof fetch);

    const foo = new PluginDownloader({ pluginId: 'foo', url: 'https://plugins.example.invalid/download.zip' }, context);
    const bar = new PluginDownloader({ pluginId: 'bar', url: 'https://mirror.example.invalid/download.zip' }, context);
    const fooResult = await foo.prepare();
    registry.markUpdated('bar', null);
    const barResult = await bar.prepare();

    if (fooResult.status !== 'staged') {
      throw new Error(`esperava staged, obteve ${fooResult.status}`);
    }
    expect(barResult.status).toBe('rejected');
    expect(path.basename(fooResult.plugin.artifactPath)).toBe('download.zip');
    expect(fs.existsSync(fooResult.plugin.artifactPath)).toBe(true);
    expect(fs.readdirSync(tempDir)).toEqual([path.basename(fooResult.plugin.workDir)]);

    await fooResult.plugin.commit();
    expect(foo.phase).toBe('accepted');
  });

  it('move o plano para failed e remove o download quando a instalacao falha', async () => {
    const { tempDir, actionLog, installer, context } = setup();
    const fetchMock = await servePlugin({ id: 'foo', name: 'Foo', version: '1.2' });
    installer.install.mockRejectedValueOnce(new Error('disco cheio'));

    const downloader = new PluginDownloader({ pluginId: 'foo', url: FOO_URL }, context);
    const result = await downloader.prepare();
    if (result.status !== 'staged') {
      throw new Error(`esperava staged, obteve ${result.status}`);
    }

    await expect(result.plugin.commit()).rejects.toThrow('disco cheio');

    expect(downloader.phase).toBe('failed');
    expect(actionLog.rollbackTo).toHaveBeenCalledWith(0);
    expect(fs.existsSync(result.plugin.workDir)).toBe(false);
    expect(fs.readdirSync(tempDir)).toEqual([]);
    expect(() => result.plugin.discard()).toThrow(ContractViolationError);

    const retried = await downloader.prepare();
    expect(retried.status).toBe('staged');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('monta URL do repositorio a partir do descritor do catalogo', () => {
    const { context } = setup();
    const catalog = descriptor({ id: 'foo', name: 'Foo Tools', version: '1.2', dependencies: ['core'] });

    const downloader = PluginDownloader.fromDescriptor(catalog, context, {
      buildNumber: BuildNumber.parse('PU-141.2735'),
      forceHttps: true,
      repository: {
        downloadUrl: 'https://plugins.example.invalid/pluginManager',
        installationId: '00000000-0000-4000-8000-000000000001',
        build: '1.0'
      }
    });

    expect(downloader.url).toBe(
      'https://plugins.example.invalid/pluginManager?action=download&id=foo&build=PU-141.2735&uuid=00000000-0000-4000-8000-000000000001'
    );
    expect(downloader.getPluginName()).toBe('Foo Tools');
    expect(downloader.getPluginVersion()).toBe('1.2');
    expect(downloader.forceHttps).toBe(true);
    expect(downloader.toCatalogEntry('https://plugins.example.invalid')).toEqual({
      id: 'foo',
      name: 'Foo Tools',
      version: '1.2',
      repositoryName: 'https://plugins.example.invalid',
      downloadUrl: downloader.url,
      dependencies: ['core'],
      description: null
    });
  });

  it('resolve URL relativa contra o host do repositorio', () => {
    const { context } = setup();
    const catalog = descriptor({ id: 'foo', version: '1.2', url: 'files/foo-1.2.zip' });

    const downloader = PluginDownloader.fromDescriptor(catalog, context, {
      host: 'https://mirror.example.invalid/repo/'
    });

    expect(downloader.url).toBe('https://mirror.example.invalid/repo/files/foo-1.2.zip');
    expect(() => PluginDownloader.fromDescriptor(descriptor({ id: 'bar', version: '1.0' }), context)).toThrow(
      'Plugin bar: informe host ou repositorio para montar a URL de download.'
    );
  });
});
