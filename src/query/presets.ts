import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { DuplicatePresetError, InvalidPresetError, errorMessage } from '../errors';
import { logger } from '../utils/logger';
import {
  AGE_OPS,
  AGE_UNITS,
  COUNT_OPS,
  parseLeadingInt,
  type AgeOp,
  type AgeUnit,
  type CountOp,
  type Predicate,
} from './predicate';

export interface SavedFilterPreset {
  name: string;
  namePattern: string;
  ageOp: AgeOp;
  ageValue: number;
  ageUnit: AgeUnit;
  consumerOp: CountOp;
  consumerValue: number;
  messagesOp: CountOp;
  messagesValue: number;
}

export interface PresetStore {
  loadPresets(): Promise<SavedFilterPreset[]>;
  /** Rejects with {@link DuplicatePresetError} when the name is taken. */
  savePreset(preset: SavedFilterPreset): Promise<void>;
}

const MAX_STORED = BigInt(Number.MAX_SAFE_INTEGER);

/** JSON numbers are doubles; anything past 2^53 - 1 would come back as a different filter. */
function toStoredInt(text: string): number {
  const parsed = parseLeadingInt(text);
  if (parsed === undefined) return 0;
  if (parsed > MAX_STORED || parsed < -MAX_STORED) {
    throw new InvalidPresetError(`Value '${text.trim()}' is too large to save in a filter`);
  }
  return Number(parsed);
}

/** Snapshot of the form under `name`. Unparseable or empty values are stored as 0. */
export function toPreset(name: string, predicate: Predicate): SavedFilterPreset {
  const trimmed = name.trim();
  if (!trimmed) throw new InvalidPresetError('Filter name cannot be empty');

  return {
    name: trimmed,
    namePattern: predicate.namePattern,
    ageOp: predicate.age.op,
    ageValue: toStoredInt(predicate.age.value),
    ageUnit: predicate.age.unit,
    consumerOp: predicate.consumers.op,
    consumerValue: toStoredInt(predicate.consumers.value),
    messagesOp: predicate.messages.op,
    messagesValue: toStoredInt(predicate.messages.value),
  };
}

/**
 * Rebuilds form state. A stored 0 comes back as an empty field, except for
 * `= 0` on the count clauses, which is a real filter.
 */
export function fromPreset(preset: SavedFilterPreset): Predicate {
  const countText = (value: number, op: CountOp) =>
    value > 0 || op === '=' ? String(value) : '';

  return {
    namePattern: preset.namePattern,
    age: {
      op: preset.ageOp,
      value: preset.ageValue > 0 ? String(preset.ageValue) : '',
      unit: preset.ageUnit,
    },
    consumers: { op: preset.consumerOp, value: countText(preset.consumerValue, preset.consumerOp) },
    messages: { op: preset.messagesOp, value: countText(preset.messagesValue, preset.messagesOp) },
  };
}

// --- ON-DISK FORMAT ---

const storedPresetSchema = z.object({
  name: z.string().min(1),
  name_pattern: z.string().default('*'),
  age_op: z.enum(AGE_OPS).default('any'),
  age_value: z.number().int().default(0),
  age_unit: z.enum(AGE_UNITS).default('h'),
  consumer_op: z.enum(COUNT_OPS).default('any'),
  consumer_value: z.number().int().default(0),
  messages_op: z.enum(COUNT_OPS).default('any'),
  messages_value: z.number().int().default(0),
});

const filterFileSchema = z.object({
  filters: z.array(storedPresetSchema).default([]),
});

type StoredPreset = z.infer<typeof storedPresetSchema>;

function decode(stored: StoredPreset): SavedFilterPreset {
  return {
    name: stored.name,
    namePattern: stored.name_pattern,
    ageOp: stored.age_op,
    ageValue: stored.age_value,
    ageUnit: stored.age_unit,
    consumerOp: stored.consumer_op,
    consumerValue: stored.consumer_value,
    messagesOp: stored.messages_op,
    messagesValue: stored.messages_value,
  };
}

function encode(preset: SavedFilterPreset): StoredPreset {
  return {
    name: preset.name,
    name_pattern: preset.namePattern,
    age_op: preset.ageOp,
    age_value: preset.ageValue,
    age_unit: preset.ageUnit,
    consumer_op: preset.consumerOp,
    consumer_value: preset.consumerValue,
    messages_op: preset.messagesOp,
    messages_value: preset.messagesValue,
  };
}

export function defaultPresetPath(homeDir: string = os.homedir()): string {
  return path.join(homeDir, '.config', 'stream-ops', 'filters.json');
}

function isNotFound(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

/**
 * Presets in a JSON file, `{ "filters": [...] }`, kept in save order.
 * A missing file is an empty list.
 */
export class FilePresetStore implements PresetStore {
  private readonly log = logger.child('presets');

  constructor(public readonly filePath: string = defaultPresetPath()) { }

  async loadPresets(): Promise<SavedFilterPreset[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (e) {
      if (isNotFound(e)) return [];
      throw e;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      throw new InvalidPresetError(`Failed to parse ${this.filePath}: ${errorMessage(e)}`);
    }

    const result = filterFileSchema.safeParse(json);
    if (!result.success) {
      const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new InvalidPresetError(`Invalid filters file ${this.filePath}: ${issues}`);
    }
    return result.data.filters.map(decode);
  }

  async savePreset(preset: SavedFilterPreset): Promise<void> {
    const existing = await this.loadPresets();
    if (existing.some(p => p.name === preset.name)) {
      throw new DuplicatePresetError(preset.name);
    }

    const next = { filters: [...existing, preset].map(encode) };
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(next, null, 2) + '\n', 'utf8');
    this.log.debug(`Saved filter '${preset.name}' to ${this.filePath}`);
  }
}

export class MemoryPresetStore implements PresetStore {
  private readonly presets: SavedFilterPreset[];

  constructor(initial: SavedFilterPreset[] = []) {
    this.presets = initial.map(p => ({ ...p }));
  }

  async loadPresets(): Promise<SavedFilterPreset[]> {
    return this.presets.map(p => ({ ...p }));
  }

  async savePreset(preset: SavedFilterPreset): Promise<void> {
    if (this.presets.some(p => p.name === preset.name)) {
      throw new DuplicatePresetError(preset.name);
    }
    this.presets.push({ ...preset });
  }
}
