/**
 * Room Config Store - durable per-channel settings
 *
 * - One row per room, created lazily on the first write; reads of unknown
 *   rooms return defaults without inserting anything
 * - Upserts are partial, validated against the configured context bounds,
 *   serialized per room and applied as a single-row replace in a transaction
 * - Storage failures surface as StorageUnavailableError; nothing is retried here
 */

import { eq } from 'drizzle-orm';
import { logger, roomConfigs, type DbHandle, type RoomConfigRow } from '@threadsage/shared';
import type { AppConfig } from '../config/app-config.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { InvalidConfigurationError, StorageUnavailableError } from '../types/errors.js';

const MAX_ASSISTANT_NAME_LENGTH = 100;
const MAX_PROMPT_LENGTH = 5000;

export interface RoomConfig {
  readonly roomId: string;
  readonly assistants: readonly string[];
  /** null means "use the default system prompt" */
  readonly customPrompt: string | null;
  readonly contextSize: number;
  /** null for rooms that have never been written */
  readonly updatedAt: string | null;
}

export interface RoomConfigUpdate {
  assistants?: readonly string[];
  /** null or blank clears the override */
  customPrompt?: string | null;
  contextSize?: number;
}

export interface RoomConfigDisplay {
  config: RoomConfig;
  hasCustomConfig: boolean;
  contextMin: number;
  contextMax: number;
}

type StoreSettings = Pick<AppConfig, 'defaultAssistants'> & {
  context: Pick<AppConfig['context'], 'min' | 'max'>;
};

export class ConfigStore {
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly handle: DbHandle,
    private readonly settings: StoreSettings,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Effective config for a room. Never creates a row.
   */
  async get(roomId: string): Promise<RoomConfig> {
    const row = this.readRow(roomId);
    return row ? this.fromRow(row) : this.defaults(roomId);
  }

  /**
   * Apply the fields present in `update`, leaving the others untouched
   */
  async upsert(roomId: string, update: RoomConfigUpdate): Promise<RoomConfig> {
    const patch = this.validate(update);

    return this.locks.runExclusive(roomId, () => {
      const saved = this.guard('upsert', roomId, () =>
        this.handle.db.transaction((tx) => {
          const existing = tx.select().from(roomConfigs).where(eq(roomConfigs.roomId, roomId)).get();
          const base = existing ? this.fromRow(existing) : this.defaults(roomId);

          const updatedAt = this.nextTimestamp(existing?.updatedAt ?? null);
          const next = {
            roomId,
            assistants: JSON.stringify(patch.assistants ?? base.assistants),
            customPrompt: patch.customPrompt !== undefined ? patch.customPrompt : base.customPrompt,
            contextSize: patch.contextSize ?? base.contextSize,
            updatedAt,
          };

          tx.insert(roomConfigs)
            .values(next)
            .onConflictDoUpdate({
              target: roomConfigs.roomId,
              set: {
                assistants: next.assistants,
                customPrompt: next.customPrompt,
                contextSize: next.contextSize,
                updatedAt: next.updatedAt,
              },
            })
            .run();

          return tx.select().from(roomConfigs).where(eq(roomConfigs.roomId, roomId)).get();
        })
      );

      if (!saved) {
        throw new StorageUnavailableError(`Room config for ${roomId} missing after write`, { roomId });
      }

      logger.info(`💾 Saved room config for ${roomId}`, {
        roomId,
        fields: Object.keys(patch),
      });
      return this.fromRow(saved);
    });
  }

  /**
   * Config plus what the config modal needs to render it
   */
  async describe(roomId: string): Promise<RoomConfigDisplay> {
    const row = this.readRow(roomId);
    return {
      config: row ? this.fromRow(row) : this.defaults(roomId),
      hasCustomConfig: row !== undefined,
      contextMin: this.settings.context.min,
      contextMax: this.settings.context.max,
    };
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private readRow(roomId: string): RoomConfigRow | undefined {
    return this.guard('get', roomId, () =>
      this.handle.db.select().from(roomConfigs).where(eq(roomConfigs.roomId, roomId)).get()
    );
  }

  private defaults(roomId: string): RoomConfig {
    return Object.freeze({
      roomId,
      assistants: Object.freeze([...this.settings.defaultAssistants]),
      customPrompt: null,
      contextSize: this.settings.context.min,
      updatedAt: null,
    });
  }

  private fromRow(row: RoomConfigRow): RoomConfig {
    return Object.freeze({
      roomId: row.roomId,
      assistants: Object.freeze(this.parseAssistants(row)),
      customPrompt: row.customPrompt,
      contextSize: this.clampStoredSize(row),
      updatedAt: row.updatedAt,
    });
  }

  private parseAssistants(row: RoomConfigRow): string[] {
    try {
      const parsed: unknown = JSON.parse(row.assistants);
      if (Array.isArray(parsed) && parsed.every((a): a is string => typeof a === 'string')) {
        return parsed;
      }
    } catch (error) {
      logger.warn(`Failed to parse assistant list for room ${row.roomId}, using defaults`, {
        roomId: row.roomId,
        error: error instanceof Error ? error.message : String(error),
      });
      return [...this.settings.defaultAssistants];
    }
    logger.warn(`Invalid assistant list format for room ${row.roomId}, using defaults`, { roomId: row.roomId });
    return [...this.settings.defaultAssistants];
  }

  // Bounds may have moved since the row was written
  private clampStoredSize(row: RoomConfigRow): number {
    const { min, max } = this.settings.context;
    const clamped = Math.max(min, Math.min(row.contextSize, max));
    if (clamped !== row.contextSize) {
      logger.warn(
        `Context size ${row.contextSize} for room ${row.roomId} is out of bounds [${min}-${max}], clamping to ${clamped}`
      );
    }
    return clamped;
  }

  private nextTimestamp(previous: string | null): string {
    const current = this.now().toISOString();
    return previous !== null && previous > current ? previous : current;
  }

  private validate(update: RoomConfigUpdate): RoomConfigUpdate {
    const patch: RoomConfigUpdate = {};

    if (update.assistants !== undefined) {
      const seen = new Set<string>();
      for (const raw of update.assistants) {
        const name = raw.trim();
        if (name && name.length <= MAX_ASSISTANT_NAME_LENGTH) {
          seen.add(name);
        }
      }
      patch.assistants = [...seen];
    }

    if (update.customPrompt !== undefined) {
      const prompt = update.customPrompt?.trim() ?? '';
      if (prompt.length > MAX_PROMPT_LENGTH) {
        throw new InvalidConfigurationError(
          `System prompt must be at most ${MAX_PROMPT_LENGTH} characters`,
          'customPrompt',
          { length: prompt.length }
        );
      }
      patch.customPrompt = prompt || null;
    }

    if (update.contextSize !== undefined) {
      const { min, max } = this.settings.context;
      const size = update.contextSize;
      if (!Number.isInteger(size) || size < min || size > max) {
        throw new InvalidConfigurationError(
          `Context size must be a whole number between ${min} and ${max}`,
          'contextSize',
          { contextSize: size, min, max }
        );
      }
      patch.contextSize = size;
    }

    if (Object.keys(patch).length === 0) {
      throw new InvalidConfigurationError('No configuration fields provided');
    }

    return patch;
  }

  private guard<T>(operation: string, roomId: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof InvalidConfigurationError || error instanceof StorageUnavailableError) {
        throw error;
      }
      logger.error(`❌ Room config ${operation} failed for ${roomId}`, {
        roomId,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new StorageUnavailableError(`Room config storage unavailable during ${operation}`, { roomId }, { cause: error });
    }
  }
}
