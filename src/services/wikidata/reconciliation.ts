/**
 * Reconciliation
 *
 * Publishes a twin relationship found on the wiki to the knowledge base,
 * carrying the reference fields the caller selected. The write client itself
 * is supplied by the host; this module resolves ids and shapes statements.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/wikidata/reconciliation
 */

import type {
  AlignedEntry,
  KnowledgeBaseTwin,
  ReconciliationPayload,
  ReconciliationResult,
  ReferenceFieldSelection,
  ReferenceRecord,
  StatementReference,
  TwinStatement,
} from '../../models/comparison.js';
import { ValidationError } from '../../utils/validation.js';
import { KnowledgeBaseError } from './errors.js';
import { entityIdFromUrl } from './query-client.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES & CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

/** Property ids used in written statements */
export const STATEMENT_PROPERTIES = {
  twinCity: 'P190',
  retrieved: 'P813',
  title: 'P1476',
  referenceUrl: 'P854',
} as const;

/** Day precision for time values */
export const DAY_PRECISION = 11;

export interface KnowledgeBaseWriter {
  /** English label of an entity, or null when it has none */
  getLabel(entityId: string): Promise<string | null>;
  /** Add one statement; rejects with the remote error message on refusal */
  addTwinStatement(statement: TwinStatement): Promise<void>;
}

export interface IdentifierLookup {
  extractIdsFromUrl(url: string): Promise<string[]>;
}

export interface PayloadInput {
  cityUrl: string;
  /** Knowledge base twins of the city; the first known sourceId wins */
  knowledgeBaseTwins: readonly KnowledgeBaseTwin[];
  /** The twin as listed on the wiki */
  wikiTwin: { url: string; name: string } | undefined;
  references: ReadonlyArray<AlignedEntry<ReferenceRecord>>;
  selections: readonly ReferenceFieldSelection[];
}

const MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

// ═══════════════════════════════════════════════════════════════════════════════
// PAYLOAD
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Wiki-side values of the selected reference fields, one object per
 * reference in order of first selection.
 * @throws ValidationError when a selection names no reference or one without a wiki side
 */
export function selectReferenceFields(
  references: ReadonlyArray<AlignedEntry<ReferenceRecord>>,
  selections: readonly ReferenceFieldSelection[]
): Array<Partial<ReferenceRecord>> {
  const selected = new Map<number, Partial<ReferenceRecord>>();
  for (const { referenceIndex, property } of selections) {
    const entry = references[referenceIndex];
    if (entry === undefined) {
      throw new ValidationError(`reference_index ${referenceIndex} is out of range`);
    }
    const wiki = entry.right;
    if (wiki === undefined) {
      throw new ValidationError(`reference_index ${referenceIndex} has no wiki reference`);
    }
    const fields = selected.get(referenceIndex) ?? {};
    fields[property] = wiki[property] ?? undefined;
    selected.set(referenceIndex, fields);
  }
  return [...selected.values()];
}

export function buildReconciliationPayload(input: PayloadInput): ReconciliationPayload {
  const wikiTwin = input.wikiTwin;
  if (wikiTwin === undefined) {
    throw new ValidationError('Selected twin is not listed on the wiki');
  }
  const sourceId = input.knowledgeBaseTwins.find((twin) => twin.sourceId !== null)?.sourceId ?? null;

  return {
    sourceUrl: input.cityUrl,
    sourceId,
    twin: {
      url: wikiTwin.url,
      name: wikiTwin.name,
      references: selectReferenceFields(input.references, input.selections),
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATEMENTS
// ═══════════════════════════════════════════════════════════════════════════════

function isoDay(year: number, month: number, day: number): string | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * Latest of the dates in an access-date string, as a day-precision time
 * value such as "+2019-09-21T00:00:00Z". Accepts "2019-09-21" and
 * "21 September 2019", several of them separated by spaces.
 * @throws ValidationError when any part is not a date in those forms
 */
export function parseAccessDate(value: string): string {
  const pattern = /(\d{4})-(\d{2})-(\d{2})|(\d{1,2}) ([A-Za-z]+) (\d{4})/y;
  const days: string[] = [];
  let position = 0;
  const text = value.trim();

  while (position < text.length) {
    if (text[position] === ' ') {
      position++;
      continue;
    }
    pattern.lastIndex = position;
    const match = pattern.exec(text);
    const day =
      match === null
        ? null
        : match[1] !== undefined
          ? isoDay(Number(match[1]), Number(match[2]), Number(match[3]))
          : isoDay(Number(match[6]), MONTHS.indexOf(match[5].toLowerCase()) + 1, Number(match[4]));
    if (match === null || day === null) {
      throw new ValidationError(`No valid date format found in "${value}"`);
    }
    days.push(day);
    position = pattern.lastIndex;
  }

  if (days.length === 0) {
    throw new ValidationError('Access date is empty');
  }
  const latest = days.reduce((max, day) => (day > max ? day : max));
  return `+${latest}T00:00:00Z`;
}

export function toStatementReference(record: Partial<ReferenceRecord>): StatementReference {
  return {
    retrieved: record.accessDate ? parseAccessDate(record.accessDate) : null,
    url: record.url ?? null,
    title: record.name ? { text: record.name, language: record.language ?? 'en' } : null,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVICE
// ═══════════════════════════════════════════════════════════════════════════════

export class ReconciliationService {
  constructor(
    private readonly lookup: IdentifierLookup,
    private readonly writer: KnowledgeBaseWriter
  ) {}

  /**
   * Write the twin statement on the source entity and, when `twoSided`,
   * the reverse statement on the twin.
   */
  async reconcile(payload: ReconciliationPayload, twoSided = true): Promise<ReconciliationResult> {
    const sourceId =
      payload.sourceId !== null && payload.sourceId.length > 0
        ? entityIdFromUrl(payload.sourceId)
        : await this.resolveId(payload.sourceUrl);
    const targetId = await this.resolveId(payload.twin.url);
    const references = payload.twin.references.map(toStatementReference);

    await this.write({
      subjectId: sourceId,
      targetId,
      twinName: payload.twin.name,
      references,
      summary: `Added twin city ${payload.twin.name}`,
    });
    let statementsWritten = 1;

    if (twoSided) {
      const sourceName = (await this.writer.getLabel(sourceId)) ?? sourceId;
      await this.write({
        subjectId: targetId,
        targetId: sourceId,
        twinName: sourceName,
        references,
        summary: `Added twin city ${sourceName}`,
      });
      statementsWritten++;
    }

    console.error(`[KB] Wrote ${statementsWritten} twin statement(s) between ${sourceId} and ${targetId}`);
    return { sourceId, targetId, statementsWritten };
  }

  private async resolveId(url: string): Promise<string> {
    const ids = await this.lookup.extractIdsFromUrl(url);
    if (ids.length === 0) {
      throw new KnowledgeBaseError('ID in Wikidata not found', 'IDENTIFIER_NOT_FOUND', { url });
    }
    return ids[0];
  }

  private async write(statement: TwinStatement): Promise<void> {
    try {
      await this.writer.addTwinStatement(statement);
    } catch (error) {
      if (error instanceof KnowledgeBaseError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new KnowledgeBaseError(message, 'REMOTE_WRITE_REJECTED', {
        subjectId: statement.subjectId,
        targetId: statement.targetId,
      });
    }
  }
}
