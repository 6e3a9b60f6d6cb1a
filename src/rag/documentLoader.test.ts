import fs from 'fs';
import os from 'os';
import path from 'path';
import { Document } from '@langchain/core/documents';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DirectoryNotFoundError } from '../errors.js';
import { DocumentLoader } from './documentLoader.js';

describe('DocumentLoader', () => {
  let dir: string;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'loader-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('loads text and markdown files with source metadata', async () => {
    fs.writeFileSync(path.join(dir, 'notes.txt'), 'Plain notes');
    fs.writeFileSync(path.join(dir, 'readme.md'), '# Heading');

    const docs = await new DocumentLoader().load(dir, ['.txt', '.md']);
    const byName = new Map(docs.map((doc) => [doc.metadata.file_name, doc]));

    expect(docs).toHaveLength(2);
    expect(byName.get('notes.txt')?.pageContent).toBe('Plain notes');
    expect(byName.get('notes.txt')?.metadata).toEqual({
      source_path: path.join(dir, 'notes.txt'),
      file_name: 'notes.txt',
      extension: '.txt',
    });
    expect(byName.get('readme.md')?.pageContent).toBe('# Heading');
  });

  it('only loads allowed extensions', async () => {
    fs.writeFileSync(path.join(dir, 'notes.txt'), 'Plain notes');
    fs.writeFileSync(path.join(dir, 'readme.md'), '# Heading');

    const docs = await new DocumentLoader().load(dir, ['.md']);
    expect(docs.map((doc) => doc.metadata.file_name)).toEqual(['readme.md']);
  });

  it('keeps page numbers reported by the extractor', async () => {
    fs.writeFileSync(path.join(dir, 'report.pdf'), 'unused');
    const loader = new DocumentLoader([
      [
        'pdf',
        () => ({
          load: async () => [
            new Document({ pageContent: 'page one', metadata: { loc: { pageNumber: 1 } } }),
            new Document({ pageContent: 'page two', metadata: { loc: { pageNumber: 2 } } }),
          ],
        }),
      ],
    ]);

    const docs = await loader.load(dir, ['.pdf']);
    expect(docs.map((doc) => doc.metadata.page_number)).toEqual([1, 2]);
    expect(docs[1].metadata.file_name).toBe('report.pdf');
  });

  it('skips files that fail to extract', async () => {
    fs.writeFileSync(path.join(dir, 'good.txt'), 'fine');
    fs.writeFileSync(path.join(dir, 'bad.docx'), 'not a docx');
    const loader = new DocumentLoader();
    loader.addExtractor('.docx', () => ({
      load: async () => {
        throw new Error('corrupt archive');
      },
    }));

    const docs = await loader.load(dir, ['.txt', '.docx']);
    expect(docs.map((doc) => doc.metadata.file_name)).toEqual(['good.txt']);
    expect(console.warn).toHaveBeenCalledWith('Error loading bad.docx: Error: corrupt archive');
  });

  it('returns nothing for files without an extractor', async () => {
    const loader = new DocumentLoader([]);
    expect(await loader.loadFile(path.join(dir, 'slides.pptx'))).toEqual([]);
    expect(loader.supportedExtensions).toEqual([]);
  });

  it('returns an empty list for a directory with no matching files', async () => {
    fs.writeFileSync(path.join(dir, 'image.png'), 'png');
    expect(await new DocumentLoader().load(dir, ['.txt'])).toEqual([]);
  });

  it('rejects a missing directory', async () => {
    await expect(new DocumentLoader().load(path.join(dir, 'missing'), ['.txt'])).rejects.toThrow(
      DirectoryNotFoundError
    );
  });
});
