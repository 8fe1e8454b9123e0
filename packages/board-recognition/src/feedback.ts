/**
 * Feedback store
 *
 * Append-only log of human corrections to square classifications, kept in a
 * JSON file for later retraining. Each correction is keyed by the photo's
 * content hash and the square name; a newer correction for the same key
 * supersedes (deactivates) the older one instead of replacing it, so the
 * history stays intact while training only ever sees the latest label.
 *
 * Mutating calls queue behind one another, so overlapping calls from the
 * same store are safe. There is no cross-process locking.
 */

import { randomBytes } from 'node:crypto';
import { constants } from 'node:fs';
import { copyFile, mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { PIECE_TYPES } from './types';
import type {
  CorrectionRecord,
  Orientation,
  PieceType,
  RawImage,
  TrainingSample,
} from './types';
import { computeImageHash, correctionKey } from './hash';
import { readPng, writePng } from './image-io';

// ============================================================================
// Persisted format
// ============================================================================

/**
 * One entry of the JSON log. Everything after `timestamp` was added over
 * time, so older logs may lack it.
 */
const persistedRecordSchema = z.object({
  square_name: z.string().regex(/^[a-h][1-8]$/),
  original_prediction: z.enum(PIECE_TYPES).nullish(),
  original_confidence: z.number(),
  user_correction: z.enum(PIECE_TYPES),
  timestamp: z.string(),
  square_image_path: z.string().nullish(),
  board_orientation: z.enum(['white', 'black']).nullish(),
  session_id: z.string().nullish(),
  unique_key: z.string().nullish(),
  image_hash: z.string().nullish(),
  is_active: z.boolean().nullish(),
});

type PersistedRecord = z.infer<typeof persistedRecordSchema>;

function fromPersisted(p: PersistedRecord): CorrectionRecord {
  const imageHash = p.image_hash ?? null;
  return {
    squareName: p.square_name,
    originalPrediction: p.original_prediction ?? null,
    originalConfidence: p.original_confidence,
    userCorrection: p.user_correction,
    timestamp: p.timestamp,
    squareImagePath: p.square_image_path ?? null,
    boardOrientation: p.board_orientation ?? null,
    sessionId: p.session_id ?? null,
    imageHash,
    // The key is a pure function of these two, so it can be rebuilt
    uniqueKey: p.unique_key ?? correctionKey(imageHash, p.square_name),
    // Logs written before superseding existed only held live corrections
    isActive: p.is_active ?? true,
  };
}

function toPersisted(r: CorrectionRecord): PersistedRecord {
  return {
    square_name: r.squareName,
    original_prediction: r.originalPrediction,
    original_confidence: r.originalConfidence,
    user_correction: r.userCorrection,
    timestamp: r.timestamp,
    square_image_path: r.squareImagePath,
    board_orientation: r.boardOrientation,
    session_id: r.sessionId,
    unique_key: r.uniqueKey,
    image_hash: r.imageHash,
    is_active: r.isActive,
  };
}

// ============================================================================
// Helpers
// ============================================================================

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/** `YYYYMMDD_HHMMSS` in UTC */
function compactStamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}`;
}

/** `YYYYMMDD_HHMMSS_mmm` in UTC */
function millisStamp(date: Date): string {
  return `${compactStamp(date)}_${date.toISOString().slice(20, 23)}`;
}

export function generateSessionId(now: Date = new Date()): string {
  return `session_${compactStamp(now)}_${randomBytes(4).toString('hex')}`;
}

// ============================================================================
// Store
// ============================================================================

export const SQUARE_IMAGE_DIR = 'square_images';

export interface FeedbackStoreOptions {
  /** JSON log location (default `<cwd>/output/piece_recognition_feedback.json`) */
  logPath?: string;
  /** Defaults to a fresh `session_<stamp>_<hex>` id */
  sessionId?: string;
  /** Enable debug logging */
  debug?: boolean;
  /** Clock, for tests */
  now?: () => Date;
}

export interface CorrectionInput {
  squareName: string;
  originalPrediction: PieceType | null;
  originalConfidence: number;
  userCorrection: PieceType;
  /** Stored as a PNG beside the log so the correction can be trained on */
  squareImage?: RawImage;
  orientation?: Orientation | null;
}

export interface CorrectionStatistics {
  totalCorrections: number;
  activeCorrections: number;
  supersededCorrections: number;
  /** Active records only */
  byPieceType: Partial<Record<PieceType, number>>;
  /** Active records only */
  bySession: Record<string, number>;
  /** Mean over active records; 0 when none are active */
  avgOriginalConfidence: number;
}

export interface SessionSummary {
  firstTimestamp: string;
  lastTimestamp: string;
  activeCount: number;
  totalCount: number;
}

export class FeedbackStore {
  readonly logPath: string;
  readonly imageDir: string;
  readonly sessionId: string;
  private log: CorrectionRecord[] = [];
  /** uniqueKey → position of its single active record in `log` */
  private activeByKey = new Map<string, number>();
  private imageHash: string | null = null;
  private debugEnabled: boolean;
  private now: () => Date;
  private lastStamp = '';
  private stampSeq = 0;
  private writeSeq = 0;
  /** Tail of the mutation queue; always settles */
  private pending: Promise<void> = Promise.resolve();

  private constructor(options: FeedbackStoreOptions) {
    const {
      logPath = path.join(process.cwd(), 'output', 'piece_recognition_feedback.json'),
      debug = false,
      now = () => new Date(),
    } = options;
    this.logPath = path.resolve(logPath);
    this.imageDir = path.join(path.dirname(this.logPath), SQUARE_IMAGE_DIR);
    this.now = now;
    this.sessionId = options.sessionId ?? generateSessionId(now());
    this.debugEnabled = debug;
  }

  /** Open (or start) the log at `logPath` */
  static async open(options: FeedbackStoreOptions = {}): Promise<FeedbackStore> {
    const store = new FeedbackStore(options);
    await store.load();
    store.debugLog(`Initialized with ${store.log.length} records`, {
      logPath: store.logPath,
      sessionId: store.sessionId,
    });
    return store;
  }

  private debugLog(message: string, payload?: Record<string, unknown>): void {
    if (!this.debugEnabled) return;
    if (payload) {
      console.log('[FeedbackStore][debug]', message, payload);
    } else {
      console.log('[FeedbackStore][debug]', message);
    }
  }

  // --------------------------------------------------------------------------
  // Current photo
  // --------------------------------------------------------------------------

  get currentImageHash(): string | null {
    return this.imageHash;
  }

  /** Identify the photo subsequent corrections belong to */
  setCurrentImage(image: RawImage): string {
    this.imageHash = computeImageHash(image);
    this.debugLog(`Current image hash ${this.imageHash.slice(0, 12)}…`);
    return this.imageHash;
  }

  // --------------------------------------------------------------------------
  // Writing
  // --------------------------------------------------------------------------

  /**
   * Record a correction for a square of the current photo.
   *
   * Any active record for the same (photo, square) is superseded, the new
   * record is appended as active, and the whole log is rewritten before the
   * promise resolves. On a failed write the in-memory log is rolled back and
   * the stored square image removed.
   */
  async addCorrection(input: CorrectionInput): Promise<CorrectionRecord> {
    if (!/^[a-h][1-8]$/.test(input.squareName)) {
      throw new Error(`Invalid square name: ${input.squareName}`);
    }
    // The photo and time are those of the call, not of the queued write
    const imageHash = this.imageHash;
    const now = this.now();
    return this.serialize(() => this.commitCorrection(input, imageHash, now));
  }

  private async commitCorrection(
    input: CorrectionInput,
    imageHash: string | null,
    now: Date
  ): Promise<CorrectionRecord> {
    const { squareName, squareImage } = input;
    let squareImagePath: string | null = null;
    let imageFile: string | null = null;
    if (squareImage) {
      squareImagePath = path.posix.join(
        SQUARE_IMAGE_DIR,
        `${squareName}_${this.nextImageStamp(now)}.png`
      );
      imageFile = this.resolveImagePath(squareImagePath);
      await mkdir(this.imageDir, { recursive: true });
      await writePng(imageFile, squareImage);
    }

    const uniqueKey = correctionKey(imageHash, squareName);
    const record: CorrectionRecord = {
      squareName,
      originalPrediction: input.originalPrediction,
      originalConfidence: input.originalConfidence,
      userCorrection: input.userCorrection,
      timestamp: now.toISOString(),
      squareImagePath,
      boardOrientation: input.orientation ?? null,
      sessionId: this.sessionId,
      imageHash,
      uniqueKey,
      isActive: true,
    };

    const superseded = this.activeByKey.get(uniqueKey);
    const index = this.append(record);

    try {
      await this.save();
    } catch (err) {
      this.log.splice(index, 1);
      if (superseded !== undefined) {
        this.log[superseded].isActive = true;
        this.activeByKey.set(uniqueKey, superseded);
      } else {
        this.activeByKey.delete(uniqueKey);
      }
      if (imageFile) {
        await rm(imageFile, { force: true }).catch((rmErr: unknown) =>
          console.warn(`[FeedbackStore] Could not remove ${imageFile}: ${String(rmErr)}`)
        );
      }
      throw err;
    }

    this.debugLog(
      `Added correction for ${squareName}: ${input.originalPrediction ?? 'UNKNOWN'} -> ${input.userCorrection}`,
      { superseded: superseded !== undefined }
    );
    return { ...record };
  }

  /** Append `record`, deactivating whatever was active under its key; returns its index */
  private append(record: CorrectionRecord): number {
    const index = this.log.length;
    this.log.push(record);
    if (!record.isActive) return index;

    const previous = this.activeByKey.get(record.uniqueKey);
    if (previous !== undefined) this.log[previous].isActive = false;
    this.activeByKey.set(record.uniqueKey, index);
    return index;
  }

  /** Run `op` once every earlier mutation has settled */
  private serialize<T>(op: () => Promise<T>): Promise<T> {
    const run = this.pending.then(op);
    // The caller sees a failure through `run`; the queue moves on regardless
    this.pending = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /** `YYYYMMDD_HHMMSS_ffffff`: milliseconds plus a sequence, unique within the process */
  private nextImageStamp(now: Date): string {
    const base = millisStamp(now);
    if (base === this.lastStamp) {
      this.stampSeq++;
    } else {
      this.lastStamp = base;
      this.stampSeq = 0;
    }
    return `${base}${String(this.stampSeq).padStart(3, '0')}`;
  }

  private resolveImagePath(stored: string): string {
    return path.resolve(path.dirname(this.logPath), stored);
  }

  // --------------------------------------------------------------------------
  // Reading
  // --------------------------------------------------------------------------

  /** Copies of every record, oldest first */
  get records(): CorrectionRecord[] {
    return this.log.map(r => ({ ...r }));
  }

  get count(): number {
    return this.log.length;
  }

  private active(): CorrectionRecord[] {
    return this.log.filter(r => r.isActive);
  }

  getCorrectionStatistics(): CorrectionStatistics {
    const active = this.active();
    const byPieceType: Partial<Record<PieceType, number>> = {};
    const bySession: Record<string, number> = {};
    let confidenceSum = 0;

    for (const r of active) {
      byPieceType[r.userCorrection] = (byPieceType[r.userCorrection] ?? 0) + 1;
      if (r.sessionId !== null) bySession[r.sessionId] = (bySession[r.sessionId] ?? 0) + 1;
      confidenceSum += r.originalConfidence;
    }

    return {
      totalCorrections: this.log.length,
      activeCorrections: active.length,
      supersededCorrections: this.log.length - active.length,
      byPieceType,
      bySession,
      avgOriginalConfidence: active.length > 0 ? confidenceSum / active.length : 0,
    };
  }

  /**
   * Load the stored square image of each record and pair it with its label.
   * Records without an image are left out; a missing or unreadable file is
   * skipped with a warning.
   */
  async getTrainingData(opts: { activeOnly?: boolean } = {}): Promise<TrainingSample[]> {
    const { activeOnly = true } = opts;
    const samples: TrainingSample[] = [];

    for (const record of activeOnly ? this.active() : this.log) {
      if (!record.squareImagePath) continue;
      const file = this.resolveImagePath(record.squareImagePath);
      try {
        samples.push({ image: await readPng(file), label: record.userCorrection });
      } catch (err) {
        const reason = isErrnoException(err) && err.code === 'ENOENT' ? 'missing' : String(err);
        console.warn(
          `[FeedbackStore] Skipping training sample for ${record.squareName} (${file}): ${reason}`
        );
      }
    }

    this.debugLog(`Loaded ${samples.length} training samples`, { activeOnly });
    return samples;
  }

  /** Per session: first/last timestamp and record counts */
  getSessionSummary(): Record<string, SessionSummary> {
    const summary: Record<string, SessionSummary> = {};
    for (const r of this.log) {
      if (r.sessionId === null) continue;
      const s = summary[r.sessionId];
      if (!s) {
        summary[r.sessionId] = {
          firstTimestamp: r.timestamp,
          lastTimestamp: r.timestamp,
          activeCount: r.isActive ? 1 : 0,
          totalCount: 1,
        };
        continue;
      }
      if (r.timestamp < s.firstTimestamp) s.firstTimestamp = r.timestamp;
      if (r.timestamp > s.lastTimestamp) s.lastTimestamp = r.timestamp;
      if (r.isActive) s.activeCount++;
      s.totalCount++;
    }
    return summary;
  }

  getFeedbackBySession(sessionId: string): CorrectionRecord[] {
    return this.log.filter(r => r.sessionId === sessionId).map(r => ({ ...r }));
  }

  getFeedbackByPieceType(
    pieceType: PieceType,
    opts: { activeOnly?: boolean } = {}
  ): CorrectionRecord[] {
    const { activeOnly = true } = opts;
    return this.log
      .filter(r => r.userCorrection === pieceType && (!activeOnly || r.isActive))
      .map(r => ({ ...r }));
  }

  /** Active corrections where the user disagreed with the prediction */
  getMisclassifiedFeedback(): CorrectionRecord[] {
    return this.active()
      .filter(r => r.originalPrediction !== r.userCorrection)
      .map(r => ({ ...r }));
  }

  // --------------------------------------------------------------------------
  // Persistence
  // --------------------------------------------------------------------------

  private async load(): Promise<void> {
    let text: string;
    try {
      text = await readFile(this.logPath, 'utf8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        this.debugLog('No existing feedback file found');
        return;
      }
      throw err;
    }

    if (text.trim() === '') {
      this.debugLog('Feedback file is empty');
      return;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      const backup = await this.quarantine();
      console.warn(
        `[FeedbackStore] Feedback log is not valid JSON (${String(err)}); starting empty, original kept at ${backup}`
      );
      return;
    }

    if (!Array.isArray(raw)) {
      const backup = await this.quarantine();
      console.warn(
        `[FeedbackStore] Feedback log is not a list of records; starting empty, original kept at ${backup}`
      );
      return;
    }

    let skipped = 0;
    let duplicates = 0;
    raw.forEach((item: unknown, i: number) => {
      const parsed = persistedRecordSchema.safeParse(item);
      if (!parsed.success) {
        skipped++;
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        console.warn(`[FeedbackStore] Skipping malformed record #${i}: ${issues.join('; ')}`);
        return;
      }
      const record = fromPersisted(parsed.data);
      if (record.isActive && this.activeByKey.has(record.uniqueKey)) duplicates++;
      this.append(record);
    });

    if (duplicates > 0) {
      console.warn(
        `[FeedbackStore] ${duplicates} record(s) shared an active key with a later one; only the latest stays active`
      );
    }
    if (skipped > 0) {
      const backup = await this.quarantine();
      console.warn(
        `[FeedbackStore] Loaded ${this.log.length} records, skipped ${skipped}; original kept at ${backup}`
      );
    }
    this.debugLog(`Loaded ${this.log.length} feedback entries`);
  }

  /**
   * Copy the current log file aside before it gets rewritten without some of
   * its content. An existing backup is never overwritten.
   */
  private async quarantine(): Promise<string> {
    const base = `${this.logPath}.corrupt-${millisStamp(this.now())}`;
    for (let n = 0; ; n++) {
      const backup = n === 0 ? base : `${base}-${n}`;
      try {
        await copyFile(this.logPath, backup, constants.COPYFILE_EXCL);
        return backup;
      } catch (err) {
        if (!(isErrnoException(err) && err.code === 'EEXIST')) throw err;
      }
    }
  }

  /** Rewrite the whole log via a temp file and rename */
  private async save(): Promise<void> {
    await this.writeLog(this.logPath);
    this.debugLog(`Saved ${this.log.length} feedback entries`);
  }

  private async writeLog(target: string): Promise<void> {
    await mkdir(path.dirname(target), { recursive: true });
    const tmp = `${target}.${process.pid}.${++this.writeSeq}.tmp`;
    try {
      await writeFile(tmp, JSON.stringify(this.log.map(toPersisted), null, 2), 'utf8');
      await rename(tmp, target);
    } catch (err) {
      await rm(tmp, { force: true });
      throw err;
    }
  }

  /** Write a copy of the log elsewhere */
  exportFeedback(exportPath: string): Promise<void> {
    return this.serialize(async () => {
      await this.writeLog(path.resolve(exportPath));
      this.debugLog(`Exported feedback to ${exportPath}`);
    });
  }

  /** Forget every record and delete the log file and stored square images */
  clear(): Promise<void> {
    return this.serialize(async () => {
      this.log = [];
      this.activeByKey.clear();
      await rm(this.logPath, { force: true });
      await rm(this.imageDir, { recursive: true, force: true });
      this.debugLog('Feedback data cleared');
    });
  }
}
