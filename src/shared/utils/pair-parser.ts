/**
 * Parse free-form text into vocabulary pairs.
 *
 * Two layouts are accepted:
 *   term, translation        (or "term - translation" with a spaced dash)
 * one pair per line, or alternating lines:
 *   term
 *   translation
 */

import type { PairOrder, VocabularyPair } from '../types/core.js';
import { APP_CONFIG, TRAINING_CONFIG } from '../constants/index.js';
import { InvalidInputError } from '../errors.js';

export type PairLayout = 'separated' | 'alternating';

export interface ParsedPairs {
  layout: PairLayout;
  pairs: VocabularyPair[];
  errors: string[];
}

const DASH_SEPARATOR = /\s+[—–-]\s+/;

function countCommas(line: string): number {
  return line.split(',').length - 1;
}

/**
 * Only lines with exactly one comma or a spaced dash count towards layout detection
 */
function hasSeparator(line: string): boolean {
  return countCommas(line) === 1 || DASH_SEPARATOR.test(line);
}

function splitLine(line: string): [string, string] | null {
  const comma = line.indexOf(',');
  if (comma >= 0) {
    return [line.slice(0, comma), line.slice(comma + 1)];
  }

  const dash = DASH_SEPARATOR.exec(line);
  if (dash) {
    return [line.slice(0, dash.index), line.slice(dash.index + dash[0].length)];
  }

  return null;
}

export function detectLayout(lines: readonly string[]): PairLayout {
  const sample = lines.slice(0, TRAINING_CONFIG.FORMAT_SAMPLE_LINES);
  if (sample.length === 0) {
    return 'alternating';
  }

  const separated = sample.filter(hasSeparator).length;
  return separated >= sample.length * TRAINING_CONFIG.SEPARATED_FORMAT_RATIO ? 'separated' : 'alternating';
}

export function parsePairs(text: string, order: PairOrder = 'source-target'): ParsedPairs {
  if (text.length > APP_CONFIG.MAX_TEXT_LENGTH) {
    throw new InvalidInputError(
      `Text is too long: ${text.length} characters (maximum ${APP_CONFIG.MAX_TEXT_LENGTH})`
    );
  }

  const lines = text.split(/\r?\n/).map((line) => line.trim()).filter((line) => line.length > 0);
  const layout = detectLayout(lines);
  const errors: string[] = [];
  const raw: Array<[string, string]> = [];

  if (layout === 'separated') {
    for (const line of lines) {
      const parts = splitLine(line);
      if (!parts) {
        errors.push(`No separator in line: ${line}`);
        continue;
      }

      const [first, second] = [parts[0].trim(), parts[1].trim()];
      if (first.length === 0 || second.length === 0) {
        errors.push(`Empty value in line: ${line}`);
        continue;
      }
      raw.push([first, second]);
    }
  } else {
    for (let i = 0; i < lines.length; i += 2) {
      const first = lines[i];
      const second = lines[i + 1];
      if (first === undefined) {
        break;
      }
      if (second === undefined) {
        errors.push(`No translation for: ${first}`);
        break;
      }
      raw.push([first, second]);
    }
  }

  if (raw.length > APP_CONFIG.MAX_PAIRS_PER_BATCH) {
    throw new InvalidInputError(
      `Too many pairs: ${raw.length} (maximum ${APP_CONFIG.MAX_PAIRS_PER_BATCH})`
    );
  }

  const pairs = raw.map(([first, second]) => (
    order === 'source-target'
      ? { sourceText: first, targetText: second }
      : { sourceText: second, targetText: first }
  ));

  return { layout, pairs, errors };
}
