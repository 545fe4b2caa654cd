/**
 * Tests unitarios para src/utils/fileHelpers.ts (sobre un directorio temporal propio).
 */
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { cleanupThumbnails, validateDiskSpace } from '../../src/utils/fileHelpers';

describe('fileHelpers', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'mediagrab-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('cleanupThumbnails', () => {
    it('debe borrar solo los .webp', async () => {
      await fs.writeFile(path.join(dir, 'tema.mp3'), 'a');
      await fs.writeFile(path.join(dir, 'tema.webp'), 'b');
      await fs.writeFile(path.join(dir, 'otro.WEBP'), 'c');

      const removed = await cleanupThumbnails(dir);

      expect(removed).toBe(2);
      expect(await fs.readdir(dir)).toEqual(['tema.mp3']);
    });

    it('con sinceMs debe respetar los .webp anteriores a la sesión', async () => {
      const old = path.join(dir, 'portada.webp');
      await fs.writeFile(old, 'x');
      const past = new Date('2020-01-01T00:00:00Z');
      await fs.utimes(old, past, past);
      await fs.writeFile(path.join(dir, 'nuevo.webp'), 'y');

      const removed = await cleanupThumbnails(dir, Date.parse('2021-01-01T00:00:00Z'));

      expect(removed).toBe(1);
      expect(await fs.readdir(dir)).toEqual(['portada.webp']);
    });

    it('un directorio inexistente debe devolver 0', async () => {
      await expect(cleanupThumbnails(path.join(dir, 'no-existe'))).resolves.toBe(0);
    });
  });

  describe('validateDiskSpace', () => {
    it('debe crear el directorio y aceptar un requisito nulo', async () => {
      const target = path.join(dir, 'descargas');

      const result = await validateDiskSpace(target, 0);

      expect(result.valid).toBe(true);
      expect(result.required).toBe(0);
      await expect(fs.stat(target)).resolves.toBeTruthy();
    });
  });
});
