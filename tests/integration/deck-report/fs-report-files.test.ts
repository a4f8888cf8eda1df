import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { describe, it, expect } from 'vitest';

import {
  makeFsReportWriter,
  makeFsTemplateStore,
} from '@/modules/deck-report/shell/files/fs-report-files.js';

import { makeTempDir } from '../../fixtures/collection-db.js';
import { testLogger } from '../../fixtures/fakes.js';

describe('fs template store', () => {
  it('reads the template as UTF-8', async () => {
    const dir = await makeTempDir();
    const templatePath = path.join(dir, 'template.html');
    await writeFile(templatePath, '<h1>{n_cards} 枚</h1>', 'utf8');

    const result = await makeFsTemplateStore().readTemplate(templatePath);

    expect(result._unsafeUnwrap()).toBe('<h1>{n_cards} 枚</h1>');
  });

  it('returns a TemplateIOError for a missing file', async () => {
    const templatePath = path.join(await makeTempDir(), 'missing.html');

    const error = (await makeFsTemplateStore().readTemplate(templatePath))._unsafeUnwrapErr();

    expect(error.type).toBe('TemplateIOError');
    expect(error.path).toBe(templatePath);
    expect(error.message).toMatch(/^Failed to read template at .*missing\.html: ENOENT/);
  });
});

describe('fs report writer', () => {
  it('replaces existing content', async () => {
    const dir = await makeTempDir();
    const outputPath = path.join(dir, 'report.html');
    await writeFile(outputPath, 'old report that is longer than the new one', 'utf8');

    const result = await makeFsReportWriter({ logger: testLogger }).writeReport(outputPath, 'new');

    expect(result.isOk()).toBe(true);
    expect(await readFile(outputPath, 'utf8')).toBe('new');
    expect(await readdir(dir)).toEqual(['report.html']);
  });

  it('leaves no temporary file behind when the target cannot be replaced', async () => {
    const dir = await makeTempDir();
    const outputPath = path.join(dir, 'report.html');
    await mkdir(outputPath);

    const result = await makeFsReportWriter({ logger: testLogger }).writeReport(outputPath, 'x');

    expect(result._unsafeUnwrapErr()).toMatchObject({ type: 'OutputIOError', path: outputPath });
    expect(await readdir(dir)).toEqual(['report.html']);
  });

  it('fails when the directory does not exist', async () => {
    const outputPath = path.join(await makeTempDir(), 'nested', 'report.html');

    const result = await makeFsReportWriter({ logger: testLogger }).writeReport(outputPath, 'x');

    expect(result._unsafeUnwrapErr().type).toBe('OutputIOError');
  });
});
