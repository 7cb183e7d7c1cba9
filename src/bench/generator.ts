/** Seeded payload generator shared by the sample script and the conformance tests. */

export type Random = () => number;

/** Mulberry32: small, fast and reproducible for a given seed. */
export function seededRandom(seed: number): Random {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

const FILLER = [
  'please',
  'summarise',
  'the',
  'quarterly',
  'report',
  'for',
  'our',
  'team',
  'with',
  'bullet',
  'points',
  'and',
  'a',
  'short',
  'conclusion',
  'über',
  'naïve',
  'café',
  '東京',
  '🙂',
];

export interface GeneratedPayload {
  payload: unknown;
  /** Deny word planted in the payload, if any. */
  planted?: string;
}

export interface GeneratorOptions {
  /** Candidate words to plant. */
  words: readonly string[];
  /** Chance that a payload gets a planted word. */
  plantRate?: number;
  maxDepth?: number;
}

function pick<T>(random: Random, items: readonly T[]): T {
  return items[Math.floor(random() * items.length)];
}

function shuffleCase(random: Random, word: string): string {
  return Array.from(word, (char) => {
    const upper = char.toUpperCase();
    return random() < 0.5 && upper.toLowerCase() === char ? upper : char;
  }).join('');
}

function sentence(random: Random): string {
  const length = 1 + Math.floor(random() * 8);
  const words: string[] = [];
  for (let index = 0; index < length; index += 1) {
    words.push(pick(random, FILLER));
  }
  return words.join(' ');
}

function buildValue(random: Random, depth: number, maxDepth: number): unknown {
  const roll = random();
  if (depth >= maxDepth || roll < 0.45) {
    const leaf = random();
    if (leaf < 0.7) {
      return sentence(random);
    }
    if (leaf < 0.8) {
      return Math.floor(random() * 1000);
    }
    if (leaf < 0.9) {
      return random() < 0.5;
    }
    return null;
  }
  const size = Math.floor(random() * 4);
  if (roll < 0.7) {
    return Array.from({ length: size }, () => buildValue(random, depth + 1, maxDepth));
  }
  const record: Record<string, unknown> = {};
  for (let index = 0; index < size; index += 1) {
    record[`${pick(random, FILLER)}_${index}`] = buildValue(random, depth + 1, maxDepth);
  }
  return record;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

type Slot = { kind: 'index'; holder: unknown[]; index: number } | { kind: 'key'; holder: Record<string, unknown>; key: string };

function collectSlots(value: unknown, slots: Slot[]): void {
  if (Array.isArray(value)) {
    value.forEach((item: unknown, index) => {
      if (typeof item === 'string') {
        slots.push({ kind: 'index', holder: value, index });
      } else {
        collectSlots(item, slots);
      }
    });
  } else if (isRecord(value)) {
    for (const [key, item] of Object.entries(value)) {
      if (typeof item === 'string') {
        slots.push({ kind: 'key', holder: value, key });
      } else {
        collectSlots(item, slots);
      }
    }
  }
}

/** Appends `text` to one randomly chosen string leaf, or wraps the payload when it has none. */
function plant(random: Random, payload: unknown, text: string): unknown {
  if (typeof payload === 'string') {
    return `${payload} ${text}`;
  }
  const slots: Slot[] = [];
  collectSlots(payload, slots);
  if (slots.length === 0) {
    return { wrapped: payload, note: text };
  }
  const slot = pick(random, slots);
  if (slot.kind === 'index') {
    slot.holder[slot.index] = `${String(slot.holder[slot.index])} ${text}`;
  } else {
    slot.holder[slot.key] = `${String(slot.holder[slot.key])} ${text}`;
  }
  return payload;
}

export function generatePayload(random: Random, options: GeneratorOptions): GeneratedPayload {
  const maxDepth = options.maxDepth ?? 4;
  const payload = buildValue(random, 0, maxDepth);
  if (options.words.length === 0 || random() >= (options.plantRate ?? 0.5)) {
    return { payload };
  }
  const planted = pick(random, options.words);
  const prefix = random() < 0.3 ? 'xx' : '';
  return { payload: plant(random, payload, `${prefix}${shuffleCase(random, planted)}`), planted };
}
