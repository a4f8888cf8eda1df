/**
 * Template and report files on the local filesystem.
 */

import { randomUUID } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';

import { err, ok } from 'neverthrow';

import { createOutputIOError, createTemplateIOError } from '../../core/errors.js';

import type { ReportWriter, TemplateStore } from '../../core/ports.js';
import type { Logger } from 'pino';

export const makeFsTemplateStore = (): TemplateStore => ({
  async readTemplate(filePath) {
    try {
      return ok(await fs.readFile(filePath, 'utf8'));
    } catch (error) {
      return err(createTemplateIOError(filePath, error));
    }
  },
});

export interface FsReportWriterOptions {
  logger: Logger;
}

/**
 * Writes into a temporary sibling file, then renames it over the target,
 * so the target is either replaced in full or left untouched.
 */
export const makeFsReportWriter = (options: FsReportWriterOptions): ReportWriter => {
  const log = options.logger.child({ module: 'fs-report-writer' });

  return {
    async writeReport(filePath, content) {
      const tempPath = path.join(
        path.dirname(filePath),
        `.${path.basename(filePath)}.${randomUUID()}.tmp`
      );

      try {
        await fs.writeFile(tempPath, content, 'utf8');
        await fs.rename(tempPath, filePath);
        return ok(undefined);
      } catch (error) {
        await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
          log.warn({ err: cleanupError, tempPath }, 'Failed to remove temporary report file');
        });
        return err(createOutputIOError(filePath, error));
      }
    },
  };
};
