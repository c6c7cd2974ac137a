import fs from 'node:fs';
import path from 'node:path';
import JSZip from 'jszip';
import type { ArchiveExtractor } from '@main/services/plugins/collaborators';
import { isPathInside } from '@main/services/plugins/pathSafety';

export class ZipArchiveExtractor implements ArchiveExtractor {
  async extractAll(archivePath: string, destDir: string): Promise<void> {
    const zip = await loadZip(archivePath);
    const root = path.resolve(destDir);
    fs.mkdirSync(root, { recursive: true });

    for (const entry of Object.values(zip.files)) {
      const target = path.resolve(root, entry.name);
      if (!isPathInside(root, target)) {
        throw new Error(`Entrada fora do diretorio de destino: ${entry.name}`);
      }

      if (entry.dir) {
        fs.mkdirSync(target, { recursive: true });
        continue;
      }

      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, await entry.async('nodebuffer'));
    }
  }
}

export async function loadZip(archivePath: string): Promise<JSZip> {
  const bytes = fs.readFileSync(archivePath);
  try {
    return await JSZip.loadAsync(bytes);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Arquivo nao e um zip valido: ${archivePath} (${reason})`);
  }
}
