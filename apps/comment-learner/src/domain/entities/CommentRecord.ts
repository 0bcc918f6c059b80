/**
 * @fileoverview Comment Record Entity
 *
 * Turns one raw attribute record read from a `.feats` file into a
 * labeled entity the engine can train on or score.
 *
 * @module domain/entities/CommentRecord
 */

import { createEntity, type AttributeValue, type LabeledEntity } from "@comment-tree/engine";

/**
 * A raw record as it appears in a `.feats` line. `null` means absent.
 */
export type RawCommentRecord = Readonly<Record<string, AttributeValue | null>>;

/**
 * Options for deriving a comment record
 */
export interface CommentRecordOptions {
    /** Attribute holding the classification label (default: "key") */
    labelAttribute?: string;
}

export const kDEFAULT_LABEL_ATTRIBUTE = "key";

/**
 * Position attributes and the delta each one produces, relative to the
 * comment's own `line` or `cols`.
 */
const kDELTAS = [
    { source: "prevLine", base: "line", target: "deltaLine" },
    { source: "prevCols", base: "cols", target: "deltaCols" },
    { source: "leftLine", base: "line", target: "deltaLeft" },
    { source: "rightLine", base: "line", target: "deltaRight" },
] as const;

/**
 * Build a labeled entity from a raw record.
 *
 * The label is read from `labelAttribute`. `line` and `cols` must be
 * integers. Each delta attribute is added only when its source attribute
 * is present.
 *
 * @param id - Identifier for the record, e.g. `file.feats:12`
 * @param raw - Attribute values as read from the file
 * @param options - Derivation options
 * @throws Error if the label is missing or a position is not an integer
 *
 * @example
 * ```typescript
 * const record = createCommentRecord("a.feats:1", {
 *     key     : "doc",
 *     line    : 12,
 *     cols    : 4,
 *     prevLine: 10,
 * });
 * record.get("deltaLine"); // 2
 * ```
 */
export function createCommentRecord(
    id: string,
    raw: RawCommentRecord,
    options: CommentRecordOptions = {}
): LabeledEntity {
    const labelAttribute = options.labelAttribute ?? kDEFAULT_LABEL_ATTRIBUTE;

    const label = raw[labelAttribute];
    if (label === undefined || label === null || label === "") {
        throw new Error(`Record ${id} has no label attribute '${labelAttribute}'`);
    }

    const attributes: Record<string, AttributeValue> = {};
    for (const [name, value] of Object.entries(raw)) {
        if (value !== null) {
            attributes[name] = value;
        }
    }

    const positions = {
        line: toInteger(id, "line", raw.line),
        cols: toInteger(id, "cols", raw.cols),
    };

    for (const { source, base, target } of kDELTAS) {
        const value = raw[source];
        if (value !== undefined && value !== null) {
            attributes[target] = positions[base] - toInteger(id, source, value);
        }
    }

    return createEntity(id, attributes, String(label));
}

function toInteger(id: string, attribute: string, value: AttributeValue | null | undefined): number {
    if (typeof value === "number" && Number.isInteger(value)) {
        return value;
    }
    if (typeof value === "string" && /^\s*[-+]?\d+\s*$/.test(value)) {
        return Number.parseInt(value, 10);
    }
    throw new Error(`Record ${id}: attribute '${attribute}' must be an integer, got ${JSON.stringify(value ?? null)}`);
}
