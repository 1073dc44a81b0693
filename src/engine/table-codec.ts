import { createHash } from 'node:crypto';
import { gunzipSync, gzipSync } from 'node:zlib';
import type { EquivalenceRow, PrecomputedTable } from '../domain/types.js';
import { MalformedTableError } from '../domain/errors.js';
import { GRID, GRID_SIZE } from '../domain/grid.js';
import { SerializedRowSchema, type SerializedRow } from '../domain/schemas.js';

export const TABLE_FORMAT = 'vdot-table 1';

export const TABLE_COLUMNS = [
  'v',
  'five_k_time', 'ten_k_time', 'hm_time', 'm_time',
  'e_pace_1', 'e_pace_2', 'm_pace', 't_pace', 'i_pace', 'r_pace'
] as const;

const HEADER_RE = /^# vdot-table sha256=([0-9a-f]{64})$/;
const BASE64_RE = /^[A-Za-z0-9+/]+={0,2}$/;

function toFields(row: EquivalenceRow): SerializedRow {
  const { race_times: t, paces: p } = row;
  return [
    row.index,
    t.five_k, t.ten_k, t.half_marathon, t.marathon,
    p.easy_slow, p.easy_fast, p.marathon, p.threshold, p.interval, p.repetition
  ];
}

function fromFields(fields: SerializedRow): EquivalenceRow {
  const [index, fiveK, tenK, half, marathon, easySlow, easyFast, mPace, tPace, iPace, rPace] = fields;
  return Object.freeze({
    index,
    race_times: Object.freeze({ five_k: fiveK, ten_k: tenK, half_marathon: half, marathon }),
    paces: Object.freeze({
      easy_slow: easySlow,
      easy_fast: easyFast,
      marathon: mPace,
      threshold: tPace,
      interval: iPace,
      repetition: rPace
    })
  });
}

export function sha256(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

export function serializeTable(table: PrecomputedTable): string {
  const keys = [...table.keys()].sort((a, b) => a - b);
  const lines: string[] = [TABLE_FORMAT, TABLE_COLUMNS.join(',')];
  for (const key of keys) {
    const row = table.get(key);
    if (!row) continue;
    lines.push(toFields(row).join(','));
  }
  return `${lines.join('\n')}\n`;
}

function parseRow(line: string, lineNo: number): EquivalenceRow {
  const parts = line.split(',');
  if (parts.length !== TABLE_COLUMNS.length) {
    throw new MalformedTableError(`Line ${lineNo}: expected ${TABLE_COLUMNS.length} fields, got ${parts.length}`);
  }
  if (!parts.every((p) => /^-?\d+$/.test(p))) {
    throw new MalformedTableError(`Line ${lineNo}: non-integer field`);
  }
  const parsed = SerializedRowSchema.safeParse(parts.map(Number));
  if (!parsed.success) {
    throw new MalformedTableError(`Line ${lineNo}: ${parsed.error.issues[0]?.message ?? 'invalid row'}`);
  }
  return fromFields(parsed.data);
}

export function deserializeTable(dump: string): PrecomputedTable {
  const lines = dump.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();

  if (lines[0] !== TABLE_FORMAT) throw new MalformedTableError(`Unknown table format: ${lines[0] ?? '<empty>'}`);
  if (lines[1] !== TABLE_COLUMNS.join(',')) throw new MalformedTableError('Unexpected column layout');

  const table = new Map<number, EquivalenceRow>();
  for (let i = 2; i < lines.length; i++) {
    const row = parseRow(lines[i], i + 1);
    if (table.has(row.index)) throw new MalformedTableError(`Duplicate grid index ${row.index}`);
    table.set(row.index, row);
  }

  if (table.size !== GRID_SIZE) {
    throw new MalformedTableError(`Expected ${GRID_SIZE} rows for ${GRID.min}..${GRID.max}, got ${table.size}`);
  }
  return table;
}

export function encodeTable(table: PrecomputedTable, wrapWidth = 88): string {
  const dump = serializeTable(table);
  const payload = gzipSync(Buffer.from(dump, 'utf8')).toString('base64');
  const wrapped = payload.match(new RegExp(`.{1,${wrapWidth}}`, 'g')) ?? [];
  return [`# vdot-table sha256=${sha256(dump)}`, ...wrapped].join('\n') + '\n';
}

export function decodeTable(blob: string): PrecomputedTable {
  const lines = blob.split(/\r?\n/).map((l) => l.trim()).filter(Boolean);
  const header = HEADER_RE.exec(lines[0] ?? '');
  if (!header) throw new MalformedTableError('Missing table checksum header');

  const payload = lines.slice(1).join('');
  if (!BASE64_RE.test(payload)) throw new MalformedTableError('Table payload is not base64');

  let dump: string;
  try {
    dump = gunzipSync(Buffer.from(payload, 'base64')).toString('utf8');
  } catch (err) {
    throw new MalformedTableError('Table payload does not decompress', { cause: err });
  }

  if (sha256(dump) !== header[1]) throw new MalformedTableError('Table checksum mismatch');
  return deserializeTable(dump);
}
