/**
 * Record Types
 *
 * Line items read from one side of the sheet.
 */

/** A parsed figure; null marks a cell that could not be read as a number */
export type ParsedNumber = number | null;

/** How blank cells are read: as unparseable, or as zero */
export type EmptyCellPolicy = 'unparseable' | 'zero';

/** One named line item on one side of the sheet */
export interface LedgerRecord {
  /** Grid row the item came from (0-based, reporting only) */
  readonly sourceRowIndex: number;
  /** Trimmed name in its original case */
  readonly displayName: string;
  /** Trimmed, lowercased name used for lookup and similarity */
  readonly normalizedKey: string;
  readonly budget: ParsedNumber;
  readonly actual: ParsedNumber;
}
