import { describe, it, expect, vi, afterEach } from 'vitest';
import path from 'path';

import { PaperworkJson, type CommandRunner } from './paperwork-json.js';
import { DEFAULT_PAPERWORK_COMMAND } from '../core/config.js';

function runnerReturning(stdout: string) {
  return vi.fn<CommandRunner>(async () => ({ stdout, stderr: '' }));
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('PaperworkJson.getLabels', () => {
  it('runs show through the configured command and returns the labels', async () => {
    const run = runnerReturning(
      JSON.stringify({
        document: {
          id: '20190312_1540_08',
          labels: [
            { label: 'Invoice', color: '#ff0000' },
            { label: 'Taxes', color: '#00ff00' },
          ],
        },
      })
    );
    const paperwork = new PaperworkJson(DEFAULT_PAPERWORK_COMMAND, run);

    expect(await paperwork.getLabels('20190312_1540_08')).toEqual(['Invoice', 'Taxes']);
    expect(run).toHaveBeenCalledWith('flatpak', [
      'run',
      '--command=paperwork-json',
      'work.openpaper.Paperwork',
      'show',
      '20190312_1540_08',
    ]);
  });

  it('warns and returns no labels when the document has none', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const paperwork = new PaperworkJson(['paperwork-json'], runnerReturning('{"document": {"id": "doc1"}}'));

    expect(await paperwork.getLabels('doc1')).toEqual([]);
    expect(warn).toHaveBeenCalledWith('[paperwork] No labels for doc1');
  });

  it('reports a non-zero exit as a subprocess error', async () => {
    const run = vi.fn<CommandRunner>(async () => {
      throw Object.assign(new Error('Command failed'), { code: 2, stderr: 'no such document\n' });
    });
    const paperwork = new PaperworkJson(['paperwork-json'], run);

    await expect(paperwork.getLabels('doc1')).rejects.toMatchObject({
      kind: 'subprocess',
      message: 'paperwork-json show doc1 failed (exit code 2): no such document',
    });
  });

  it('reports unparseable output as a subprocess error', async () => {
    const paperwork = new PaperworkJson(['paperwork-json'], runnerReturning('Traceback (most recent call last):'));

    await expect(paperwork.getLabels('doc1')).rejects.toMatchObject({
      kind: 'subprocess',
      message: 'paperwork-json show doc1 did not print valid JSON',
    });
  });
});

describe('PaperworkJson.listFilters', () => {
  it('probes export without an output path', async () => {
    const run = runnerReturning('["unmodified_pdf", "doc_to_pages"]');
    const paperwork = new PaperworkJson(['paperwork-json'], run);

    expect(await paperwork.listFilters('doc1')).toEqual(['unmodified_pdf', 'doc_to_pages']);
    expect(run).toHaveBeenCalledWith('paperwork-json', ['export', 'doc1']);
  });

  it('rejects output that is not a list of names', async () => {
    const paperwork = new PaperworkJson(['paperwork-json'], runnerReturning('{"filters": []}'));

    await expect(paperwork.listFilters('doc1')).rejects.toMatchObject({ kind: 'subprocess' });
  });
});

describe('PaperworkJson.exportDocument', () => {
  it('passes every filter in order followed by the absolute output path', async () => {
    const run = runnerReturning('');
    const paperwork = new PaperworkJson(['paperwork-json'], run);

    await paperwork.exportDocument('doc1', ['doc_to_pages', 'img_boxes', 'generated_pdf'], 'out/doc1.pdf');

    expect(run).toHaveBeenCalledWith('paperwork-json', [
      'export',
      'doc1',
      '--filter',
      'doc_to_pages',
      '--filter',
      'img_boxes',
      '--filter',
      'generated_pdf',
      '--out',
      path.resolve('out/doc1.pdf'),
    ]);
  });
});

describe('PaperworkJson', () => {
  it('refuses an empty command line', () => {
    expect(() => new PaperworkJson([])).toThrow('paperwork-json command is empty');
  });
});
