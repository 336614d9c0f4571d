import { Injectable, Logger } from '@nestjs/common';
import { mkdir, rename, rm, stat, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { OutputWriteError } from './output.errors';
import { errorMessage, toError } from '../common/error.utils';

/**
 * One file to publish
 */
export interface OutputFile {
  path: string;
  content: string;
}

interface StagedFile {
  target: string;
  temp: string;
  backup: string;
  content: string;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * OutputService - Publishes a run's output files together
 *
 * 1. Stage: every file is written to a temporary sibling of its target
 * 2. Swap: existing targets are moved to backups, staged files renamed in
 * 3. Commit: backups are deleted
 *
 * A failure while staging touches no target. A failure while swapping moves
 * the backups back. Either way the caller gets an OutputWriteError and the
 * previous outputs stay as they were.
 */
@Injectable()
export class OutputService {
  private readonly logger = new Logger(OutputService.name);

  async publish(files: readonly OutputFile[]): Promise<string[]> {
    const token = `${process.pid}-${Date.now()}`;
    const staged: StagedFile[] = files.map((file) => ({
      target: file.path,
      temp: `${file.path}.${token}.tmp`,
      backup: `${file.path}.${token}.bak`,
      content: file.content,
    }));

    try {
      for (const file of staged) {
        await mkdir(path.dirname(file.target), { recursive: true });
        await writeFile(file.temp, file.content, 'utf-8');
      }
    } catch (error) {
      await this.removeAll(staged.map((file) => file.temp));
      throw new OutputWriteError('Failed to write output files', toError(error));
    }

    const backedUp: StagedFile[] = [];
    const swapped: StagedFile[] = [];
    try {
      for (const file of staged) {
        if (await exists(file.target)) {
          await rename(file.target, file.backup);
          backedUp.push(file);
        }
      }
      for (const file of staged) {
        await rename(file.temp, file.target);
        swapped.push(file);
      }
    } catch (error) {
      await this.rollback(staged, backedUp, swapped);
      throw new OutputWriteError('Failed to publish output files', toError(error));
    }

    await this.removeAll(backedUp.map((file) => file.backup));

    const targets = staged.map((file) => file.target);
    this.logger.log(`Published ${targets.length} file(s): ${targets.join(', ')}`);
    return targets;
  }

  /**
   * Undo a partial swap: drop new targets, restore backups, drop temps
   */
  private async rollback(
    staged: StagedFile[],
    backedUp: StagedFile[],
    swapped: StagedFile[],
  ): Promise<void> {
    await this.removeAll(swapped.map((file) => file.target));

    for (const file of backedUp) {
      try {
        await rename(file.backup, file.target);
      } catch (error) {
        this.logger.error(
          `Could not restore ${file.target} from ${file.backup}: ${errorMessage(error)}`,
        );
      }
    }

    await this.removeAll(staged.map((file) => file.temp));
  }

  private async removeAll(paths: string[]): Promise<void> {
    for (const filePath of paths) {
      try {
        await rm(filePath, { force: true });
      } catch (error) {
        this.logger.warn(
          `Could not remove ${filePath}: ${errorMessage(error)}`,
        );
      }
    }
  }
}
