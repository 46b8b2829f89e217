/**
 * Card Ingestion
 *
 * Loads decks into the active store and handles hand-made cards. A parsed
 * card is stored only if no card with the same question and answer exists;
 * otherwise it counts as a duplicate. A store failure on one line becomes an
 * issue for that line and the rest of the deck is still loaded.
 */

import { readFile } from "node:fs/promises";
import {
  CardEditSchema,
  NewCardInputSchema,
  formatValidationError,
  type Card,
  type NewCardInput,
} from "@study-loop/shared";
import { DEFAULT_MAX_FIELD_LENGTH } from "../config.js";
import { DeckReadError } from "../errors.js";
import { createLogger } from "../logger.js";
import type { Result } from "../result.js";
import { fail, ok } from "../result.js";
import type { ReviewCoordinator } from "../scheduling/review-coordinator.js";
import type { CardRepository } from "../storage/types.js";
import { parseDeck, truncateForDisplay, type ParseIssue } from "./deck-parser.js";

const log = createLogger("Ingestion");

/** Provenance of cards added by hand before any deck was loaded */
export const MANUAL_SOURCE = "manual";

// =============================================================================
// Types
// =============================================================================

export interface ParseResult {
  sourceFile: string;
  totalLines: number;
  /** Lines that parsed into a card, stored or not */
  validCards: number;
  skippedLines: number;
  /** Cards newly written to the store */
  importedCards: number;
  /** Cards whose question and answer were already stored */
  duplicateCards: number;
  /** Stored cards for the valid lines, in line order */
  cards: Card[];
  issues: ParseIssue[];
}

export interface CardIngestionOptions {
  maxFieldLength?: number;
}

// =============================================================================
// CardIngestion Class
// =============================================================================

export class CardIngestion {
  private readonly maxFieldLength: number;
  private lastDeck: string | null = null;

  constructor(
    private readonly cards: CardRepository,
    private readonly coordinator: ReviewCoordinator,
    options: CardIngestionOptions = {}
  ) {
    this.maxFieldLength = options.maxFieldLength ?? DEFAULT_MAX_FIELD_LENGTH;
  }

  /** Locator of the most recently loaded deck */
  get currentDeck(): string | null {
    return this.lastDeck;
  }

  /**
   * Parse a deck and store its new cards.
   * Throws DeckReadError only if the file cannot be read.
   */
  async load(sourceFile: string): Promise<ParseResult> {
    let content: Buffer;
    try {
      content = await readFile(sourceFile);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      throw new DeckReadError(`Cannot read deck ${sourceFile}: ${message}`);
    }

    this.lastDeck = sourceFile;
    const parsed = parseDeck(content, this.maxFieldLength);
    const result: ParseResult = {
      sourceFile,
      totalLines: parsed.totalLines,
      validCards: parsed.entries.length,
      skippedLines: parsed.issues.length,
      importedCards: 0,
      duplicateCards: 0,
      cards: [],
      issues: [...parsed.issues],
    };

    for (const entry of parsed.entries) {
      const existing = this.cards.findByContent(entry.question, entry.answer);
      if (existing.success) {
        result.duplicateCards++;
        result.cards.push(existing.data);
        continue;
      }

      const stored =
        existing.error.kind === "not_found"
          ? this.cards.create({
              question: entry.question,
              answer: entry.answer,
              sourceFile,
              sourceLine: entry.lineNumber,
              sourceContext: null,
              promptKind: "factual",
              tags: [],
            })
          : existing;

      if (stored.success) {
        result.importedCards++;
        result.cards.push(stored.data);
      } else {
        log.warn(`Line ${entry.lineNumber} of ${sourceFile} not stored: ${stored.error.message}`);
        result.issues.push({
          lineNumber: entry.lineNumber,
          line: truncateForDisplay(entry.line),
          reason: `Failed to store card: ${stored.error.message}`,
        });
      }
    }

    result.issues.sort((a, b) => a.lineNumber - b.lineNumber);
    log.info(
      `Loaded ${sourceFile}: ${result.validCards} valid, ${result.importedCards} new, ` +
        `${result.duplicateCards} duplicate, ${result.skippedLines} skipped`
    );
    return result;
  }

  // ---------------------------------------------------------------------------
  // Card management
  // ---------------------------------------------------------------------------

  listCards(): Result<Card[]> {
    return this.cards.list();
  }

  getCard(id: number): Result<Card> {
    return this.cards.getById(id);
  }

  /**
   * Add a card by hand. Its provenance is the last loaded deck (or "manual")
   * at the line after the last known card, skipping past lines already taken.
   */
  addCard(input: NewCardInput): Result<Card> {
    const parsed = NewCardInputSchema.safeParse(input);
    if (!parsed.success) {
      return fail("validation", formatValidationError(parsed.error));
    }

    const { question, answer, sourceContext, promptKind, tags } = parsed.data;
    const existing = this.cards.findByContent(question, answer);
    if (existing.success) {
      return fail("duplicate", "A card with this question and answer already exists");
    }
    if (existing.error.kind !== "not_found") {
      return existing;
    }

    const known = this.cards.list();
    if (!known.success) return known;

    const sourceFile = this.lastDeck ?? MANUAL_SOURCE;
    // Never reuse a line another card of this source holds
    const highestLine = known.data
      .filter((card) => card.sourceFile === sourceFile)
      .reduce((max, card) => Math.max(max, card.sourceLine), 0);

    return this.cards.create({
      question,
      answer,
      sourceFile,
      sourceLine: Math.max(known.data.length, highestLine) + 1,
      sourceContext: sourceContext ? sourceContext : null,
      promptKind,
      tags,
    });
  }

  updateCard(id: number, edit: { question: string; answer: string }): Result<Card> {
    const parsed = CardEditSchema.safeParse(edit);
    if (!parsed.success) {
      return fail("validation", formatValidationError(parsed.error));
    }
    if (!this.cards.hasIdentity) {
      return fail("unsupported", "Editing cards requires the SQLite store");
    }
    return this.cards.update(id, parsed.data);
  }

  /**
   * Delete a card and its review state.
   */
  deleteCard(id: number): Result<void> {
    if (!this.cards.hasIdentity) {
      return fail("unsupported", "Deleting cards requires the SQLite store");
    }

    const deleted = this.cards.delete(id);
    if (!deleted.success) return deleted;

    const state = this.coordinator.deleteState(id);
    if (!state.success) return state;

    log.info(`Deleted card ${id}`);
    return ok(undefined);
  }
}

// =============================================================================
// Report
// =============================================================================

const REPORT_ISSUE_LIMIT = 10;

/**
 * Human-readable summary of a load.
 */
export function formatParseReport(result: ParseResult): string {
  const lines = [
    "Parse Summary:",
    `- Total lines processed: ${result.totalLines}`,
    `- Valid cards: ${result.validCards}`,
    `- New cards imported: ${result.importedCards}`,
    `- Duplicates skipped: ${result.duplicateCards}`,
    `- Lines skipped: ${result.skippedLines}`,
  ];

  if (result.issues.length > 0) {
    lines.push("", `Parsing Issues (${result.issues.length}):`);
    for (const issue of result.issues.slice(0, REPORT_ISSUE_LIMIT)) {
      lines.push(`  Line ${issue.lineNumber}: ${issue.line} - ${issue.reason}`);
    }
    if (result.issues.length > REPORT_ISSUE_LIMIT) {
      lines.push(`... and ${result.issues.length - REPORT_ISSUE_LIMIT} more issues`);
    }
  }

  return lines.join("\n") + "\n";
}
