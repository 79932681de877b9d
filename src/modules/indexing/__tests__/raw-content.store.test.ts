/**
 * Raw Content Store Tests
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { RawContentStore } from '../raw-content.store';
import { DocumentFormat } from '../../../lib/parsing';
import { SITE } from '../../../__tests__/helpers/fixtures';

describe('RawContentStore', () => {
  let dir: string;
  let store: RawContentStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'raw-store-'));
    store = new RawContentStore({ rawDir: dir, saveHtml: true, savePdf: false });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('pathFor', () => {
    it('should mirror host and path', () => {
      expect(store.pathFor(`${SITE}/2024/en/p1.html`)).toBe(
        path.join(dir, 'www.policy.example.test', '2024', 'en', 'p1.html')
      );
    });

    it('should map directory-like paths to index.html', () => {
      expect(store.pathFor(`${SITE}/2024/en/`)).toBe(path.join(dir, 'www.policy.example.test', '2024', 'en', 'index.html'));
      expect(store.pathFor(`${SITE}/2024/en/policy`)).toBe(
        path.join(dir, 'www.policy.example.test', '2024', 'en', 'policy', 'index.html')
      );
      expect(store.pathFor(SITE)).toBe(path.join(dir, 'www.policy.example.test', 'index.html'));
    });

    it('should replace characters that are unsafe in file names', () => {
      expect(store.pathFor(`${SITE}/2024/tc/%E6%96%BD.html?x=1`)).toBe(
        path.join(dir, 'www.policy.example.test', '2024', 'tc', '_E6_96_BD.html')
      );
    });
  });

  it('should save bodies of the formats it keeps', async () => {
    const url = `${SITE}/2024/en/p1.html`;

    const saved = await store.save(url, Buffer.from('<html></html>'), DocumentFormat.HTML);
    const skipped = await store.save(`${SITE}/2024/en/full.pdf`, Buffer.from('%PDF-1.4'), DocumentFormat.PDF);

    expect(saved).toBe(store.pathFor(url));
    expect(skipped).toBeNull();
    await expect(fs.readFile(store.pathFor(url), 'utf8')).resolves.toBe('<html></html>');
    await expect(store.exists(url)).resolves.toBe(true);
    await expect(store.exists(`${SITE}/2024/en/full.pdf`)).resolves.toBe(false);
  });

  it('should list saved URLs rebuilt from their paths', async () => {
    await store.save(`${SITE}/2024/en/p1.html`, Buffer.from('a'), DocumentFormat.HTML);
    await store.save(`${SITE}/2024/en/`, Buffer.from('b'), DocumentFormat.HTML);

    await expect(store.listUrls()).resolves.toEqual([`${SITE}/2024/en/`, `${SITE}/2024/en/p1.html`]);
  });

  it('should list nothing when the directory does not exist', async () => {
    const missing = new RawContentStore({ rawDir: path.join(dir, 'missing'), saveHtml: true, savePdf: true });
    await expect(missing.listUrls()).resolves.toEqual([]);
  });
});
