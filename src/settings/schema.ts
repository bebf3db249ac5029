export type ReaderSettings = {
  collaborativeMode: boolean; // reader says the last word(s) of each sentence
  kidMode: boolean;           // locks collaborativeMode on
  autoAdvance: boolean;       // plain reading continues to the next sentence
  successDwellMs: number;     // 0..10000, pause on "correct!" before advancing
  failureDwellMs: number;     // 0..10000, pause on "try again" before listening
  micFloorDb: number;         // RMS dB shown as an empty meter
  micCeilDb: number;          // RMS dB shown as a full meter
  language: string;           // BCP-47 tag handed to the recognizer
};

export const DEFAULT_READER_SETTINGS: ReaderSettings = {
  collaborativeMode: true,
  kidMode: true,
  autoAdvance: false,
  successDwellMs: 1500,
  failureDwellMs: 1200,
  micFloorDb: -2,
  micCeilDb: 10,
  language: 'en-US',
};

const MAX_DWELL_MS = 10_000;

function clampDwell(value: number, fallback: number): number {
  if (!Number.isFinite(value)) return fallback;
  return Math.max(0, Math.min(MAX_DWELL_MS, Math.floor(value)));
}

export function normalizeSettings(patch: Partial<ReaderSettings> = {}): ReaderSettings {
  const merged = { ...DEFAULT_READER_SETTINGS, ...patch };
  const floorOk = Number.isFinite(merged.micFloorDb);
  const ceilOk = Number.isFinite(merged.micCeilDb);
  const rangeOk = floorOk && ceilOk && merged.micCeilDb > merged.micFloorDb;
  const language = String(merged.language || '').trim();
  return {
    // kid mode wins over an explicit "off"
    collaborativeMode: !!merged.collaborativeMode || !!merged.kidMode,
    kidMode: !!merged.kidMode,
    autoAdvance: !!merged.autoAdvance,
    successDwellMs: clampDwell(merged.successDwellMs, DEFAULT_READER_SETTINGS.successDwellMs),
    failureDwellMs: clampDwell(merged.failureDwellMs, DEFAULT_READER_SETTINGS.failureDwellMs),
    micFloorDb: rangeOk ? merged.micFloorDb : DEFAULT_READER_SETTINGS.micFloorDb,
    micCeilDb: rangeOk ? merged.micCeilDb : DEFAULT_READER_SETTINGS.micCeilDb,
    language: language || DEFAULT_READER_SETTINGS.language,
  };
}

function parseBool(raw: string | undefined): boolean | undefined {
  if (raw == null || raw === '') return undefined;
  const v = raw.trim().toLowerCase();
  if (v === '1' || v === 'true' || v === 'on' || v === 'yes') return true;
  if (v === '0' || v === 'false' || v === 'off' || v === 'no') return false;
  return undefined;
}

function parseNum(raw: string | undefined): number | undefined {
  if (raw == null || raw.trim() === '') return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
}

/** READER_* overrides; unset or unparseable variables are left out. */
export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<ReaderSettings> {
  const out: Partial<ReaderSettings> = {};
  const collaborativeMode = parseBool(env.READER_COLLABORATIVE);
  if (collaborativeMode !== undefined) out.collaborativeMode = collaborativeMode;
  const kidMode = parseBool(env.READER_KID_MODE);
  if (kidMode !== undefined) out.kidMode = kidMode;
  const autoAdvance = parseBool(env.READER_AUTO_ADVANCE);
  if (autoAdvance !== undefined) out.autoAdvance = autoAdvance;
  const successDwellMs = parseNum(env.READER_SUCCESS_DWELL_MS);
  if (successDwellMs !== undefined) out.successDwellMs = successDwellMs;
  const failureDwellMs = parseNum(env.READER_FAILURE_DWELL_MS);
  if (failureDwellMs !== undefined) out.failureDwellMs = failureDwellMs;
  const micFloorDb = parseNum(env.READER_MIC_FLOOR_DB);
  if (micFloorDb !== undefined) out.micFloorDb = micFloorDb;
  const micCeilDb = parseNum(env.READER_MIC_CEIL_DB);
  if (micCeilDb !== undefined) out.micCeilDb = micCeilDb;
  const language = env.READER_LANGUAGE?.trim();
  if (language) out.language = language;
  return out;
}
