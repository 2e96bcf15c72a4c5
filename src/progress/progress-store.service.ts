import { Inject, Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import { getErrorMessage } from '../shared/error.utils';
import { formatProgressKey } from './interfaces';
import type { ProgressKey, ProgressState } from './interfaces';
import { PROGRESS_STATE_PATH } from './progress.tokens';

/**
 * Persists the forwarding watermark per (account, host, folder).
 *
 * The whole record is read before every mutation and rewritten atomically
 * after it, so a crash leaves either the old or the new file, never half of one.
 * A missing or corrupt file reads as "no watermark yet".
 */
@Injectable()
export class ProgressStoreService {
  private readonly logger = new Logger(ProgressStoreService.name);

  constructor(@Inject(PROGRESS_STATE_PATH) private readonly statePath: string) {}

  /**
   * Reads the full state record.
   * @returns Every valid entry; entries that are not integers are dropped.
   */
  snapshot(): ProgressState {
    if (!fs.existsSync(this.statePath)) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.statePath, 'utf-8'));
    } catch (error) {
      this.logger.warn(`Ignoring unreadable state file ${this.statePath}: ${getErrorMessage(error)}`);
      return {};
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      this.logger.warn(`Ignoring state file ${this.statePath}: expected a JSON object`);
      return {};
    }

    const state: ProgressState = {};
    for (const [key, value] of Object.entries(parsed)) {
      const watermark = this.toWatermark(value);
      if (watermark !== undefined) {
        state[key] = watermark;
      }
    }
    return state;
  }

  getWatermark(key: ProgressKey): number | undefined {
    return this.snapshot()[formatProgressKey(key)];
  }

  /**
   * Moves the watermark forward to `id` unless it is already past it.
   *
   * @param key - Stream to update
   * @param id - Identifier that was just resolved
   * @returns The watermark now stored
   */
  advance(key: ProgressKey, id: number): number {
    const state = this.snapshot();
    const stateKey = formatProgressKey(key);
    const current = state[stateKey];
    const next = current === undefined ? id : Math.max(current, id);

    if (next !== current) {
      state[stateKey] = next;
      this.atomicWriteFile(this.statePath, `${JSON.stringify(state, null, 2)}\n`);
      this.logger.debug(`Watermark for ${stateKey} advanced to ${next}`);
    }

    return next;
  }

  private toWatermark(value: unknown): number | undefined {
    if (typeof value === 'number' && Number.isInteger(value)) {
      return value;
    }
    if (typeof value === 'string' && /^\d+$/.test(value)) {
      return Number(value);
    }
    return undefined;
  }

  private atomicWriteFile(targetPath: string, data: string): void {
    const directory = path.dirname(targetPath);
    const baseName = path.basename(targetPath);
    const tempPath = path.join(
      directory,
      `${baseName}.tmp-${process.pid}-${Date.now()}-${Math.random().toString(16).slice(2)}`,
    );

    if (!fs.existsSync(directory)) {
      fs.mkdirSync(directory, { recursive: true });
    }

    try {
      fs.writeFileSync(tempPath, data, 'utf-8');
      fs.renameSync(tempPath, targetPath);
    } catch (error) {
      if (fs.existsSync(tempPath)) {
        try {
          fs.unlinkSync(tempPath);
        } catch {
          this.logger.warn(`Failed to clean up temporary state file ${tempPath}`);
        }
      }
      throw error;
    }
  }
}
