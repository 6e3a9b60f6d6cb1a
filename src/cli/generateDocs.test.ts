import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { generateDocuments, loadDocumentSets } from './generateDocs.js';

describe('generateDocuments', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'generate-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('ships two versioned document sets', () => {
    const sets = loadDocumentSets();
    expect(sets.map((set) => [set.name, set.versions.map((v) => v.date)])).toEqual([
      ['Warehouse_Platform_Overview', ['2024-02-01', '2024-07-15']],
      ['API_Design_Specification', ['2023-11-20', '2024-04-03']],
    ]);
  });

  it('writes a text and a markdown file per version', () => {
    const written = generateDocuments(path.join(dir, 'docs'), [
      {
        name: 'Runbook',
        title: 'Deployment Runbook',
        versions: [
          { date: '2024-01-01', content: 'Deploy on Tuesdays.' },
          { date: '2024-06-01', content: 'Deploy any weekday.' },
        ],
      },
    ]);

    expect(written.map((p) => path.basename(p))).toEqual([
      'Runbook_2024-01-01.txt',
      'Runbook_2024-01-01.md',
      'Runbook_2024-06-01.txt',
      'Runbook_2024-06-01.md',
    ]);
    expect(fs.readFileSync(written[0], 'utf-8')).toBe('Deployment Runbook - 2024-01-01\n\nDeploy on Tuesdays.\n');
    expect(fs.readFileSync(written[3], 'utf-8')).toBe('# Deployment Runbook - 2024-06-01\n\nDeploy any weekday.\n');
  });

  it('rejects malformed document sets', () => {
    const file = path.join(dir, 'sets.json');
    fs.writeFileSync(file, JSON.stringify([{ name: 'x', versions: [] }]));
    expect(() => loadDocumentSets(file)).toThrow(`Malformed document sets file: ${file}`);
  });
});
