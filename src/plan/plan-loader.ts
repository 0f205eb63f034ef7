import { existsSync, readFileSync } from 'node:fs';
import { createChildLogger } from '../logger.js';
import { InvalidInputError } from '../errors.js';
import { parseTimeOfDay } from '../util/time.js';
import type { Side, TradePlanEntry } from '../types/index.js';

const log = createChildLogger('plan-loader');

export interface SkippedRow {
  line: number;
  reason: string;
}

export interface ParsedPlan {
  entries: TradePlanEntry[];
  skipped: SkippedRow[];
}

const SIDE_ALIASES: Record<string, Side> = {
  BUY: 'BUY',
  LONG: 'BUY',
  L: 'BUY',
  '買': 'BUY',
  SELL: 'SELL',
  SHORT: 'SELL',
  S: 'SELL',
  '売': 'SELL',
};

const SYMBOL_RE = /^[A-Z]{3}_[A-Z]{3}$/;

export function parseCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line.charAt(i);
    if (inQuotes) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      fields.push(current.trim());
      current = '';
    } else {
      current += ch;
    }
  }
  fields.push(current.trim());
  return fields;
}

export function normalizeSide(text: string): Side | null {
  return SIDE_ALIASES[text.trim().toUpperCase()] ?? null;
}

/** `usd/jpy`, `USDJPY`, `USD_JPY` → `USD_JPY`; null when not a currency pair. */
export function normalizeSymbol(text: string): string | null {
  let s = text.trim().toUpperCase().replace(/[/\-\s]/g, '_');
  if (/^[A-Z]{6}$/.test(s)) s = `${s.slice(0, 3)}_${s.slice(3)}`;
  return SYMBOL_RE.test(s) ? s : null;
}

function parseLot(text: string): number | null | undefined {
  if (text === '') return null;
  const n = Number(text);
  if (!Number.isInteger(n) || n < 1) return undefined;
  return n;
}

/**
 * Plan CSV: header row, then `index, side, symbol, entry, exit, lot`.
 * Bad rows are skipped with their line number; blank lines are ignored.
 */
export function parsePlan(text: string): ParsedPlan {
  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);
  const entries: TradePlanEntry[] = [];
  const skipped: SkippedRow[] = [];

  const skip = (line: number, reason: string): void => {
    skipped.push({ line, reason });
    log.warn({ line, reason }, 'Plan row skipped');
  };

  // line 1 is the header
  for (let i = 1; i < lines.length; i++) {
    const raw = lines[i] ?? '';
    const lineNo = i + 1;
    if (raw.trim() === '') continue;

    const [indexText = '', sideText = '', symbolText = '', entryText = '', exitText = '', lotText = ''] =
      parseCsvLine(raw);
    if (!sideText || !symbolText || !entryText || !exitText) {
      if (parseCsvLine(raw).some((f) => f !== '')) skip(lineNo, 'incomplete row');
      continue;
    }

    const side = normalizeSide(sideText);
    if (!side) {
      skip(lineNo, `unknown side "${sideText}"`);
      continue;
    }
    const symbol = normalizeSymbol(symbolText);
    if (!symbol) {
      skip(lineNo, `invalid symbol "${symbolText}"`);
      continue;
    }
    if (!parseTimeOfDay(entryText) || !parseTimeOfDay(exitText)) {
      skip(lineNo, `invalid time "${entryText}" / "${exitText}" (HH:MM:SS)`);
      continue;
    }
    const lotSize = parseLot(lotText);
    if (lotSize === undefined) {
      skip(lineNo, `invalid lot "${lotText}"`);
      continue;
    }

    const index = Number(indexText);
    entries.push({
      index: Number.isInteger(index) && indexText !== '' ? index : entries.length + 1,
      symbol,
      side,
      entryTime: entryText,
      exitTime: exitText,
      lotSize,
    });
  }

  return { entries, skipped };
}

export function loadPlan(filePath: string): ParsedPlan {
  if (!existsSync(filePath)) {
    throw new InvalidInputError(`Plan file not found: ${filePath}`);
  }
  const plan = parsePlan(readFileSync(filePath, 'utf-8'));
  log.info({ filePath, entries: plan.entries.length, skipped: plan.skipped.length }, 'Plan loaded');
  return plan;
}
