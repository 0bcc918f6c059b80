/**
 * Entity Contract
 *
 * The labeled record that flows into tree induction and classification.
 * Domain implementations build entities from their own raw records and
 * compute any derived attributes before handing them to the engine.
 *
 * Entities are immutable once created. Features read attributes through
 * `get()` and never write back.
 */

/**
 * Raw attribute value. Strings may carry comma-delimited multi-values.
 */
export type AttributeValue = string | number;

/**
 * Classification label (the category a tree predicts).
 */
export type Label = string;

/**
 * A labeled entity.
 *
 * @example
 * ```typescript
 * const entity = createEntity("c1", { type: "line", posTags: "NN,VB" }, "doc");
 * entity.get("posTags"); // "NN,VB"
 * entity.label;          // "doc"
 * ```
 */
export interface LabeledEntity {
    /** Identifier, used for tracing only */
    readonly id: string;

    /** The designated classification label */
    readonly label: Label;

    /** Read an attribute, or undefined when the record lacks it */
    get(attribute: string): AttributeValue | undefined;
}

/**
 * Create a frozen entity over a copy of the given attributes.
 */
export function createEntity(
    id: string,
    attributes: Readonly<Record<string, AttributeValue | undefined>>,
    label: Label
): LabeledEntity {
    const values = new Map<string, AttributeValue>();
    for (const [name, value] of Object.entries(attributes)) {
        if (value !== undefined) {
            values.set(name, value);
        }
    }

    return Object.freeze({
        id,
        label,
        get: (attribute: string) => values.get(attribute),
    });
}
