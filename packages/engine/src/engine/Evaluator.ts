/**
 * @fileoverview Evaluator
 *
 * Classifies entities against a tree and scores predictions.
 *
 * @module @comment-tree/engine/engine/Evaluator
 */

import type { Label, LabeledEntity } from "../contracts/Entity.js";
import { EmptyInputError } from "../contracts/Errors.js";
import { isBranch, type TreeNode } from "../contracts/TreeNode.js";

/**
 * Predict a label for `entity`.
 *
 * A branch value the tree never saw during training resolves to that
 * branch's default label, so classification never fails.
 */
export function classify(tree: TreeNode, entity: LabeledEntity): Label {
    let node = tree;
    while (isBranch(node)) {
        const value = node.feature.identify(node.arg, entity);
        const child = node.children.get(value);
        if (!child) {
            return node.defaultLabel;
        }
        node = child;
    }
    return node.label;
}

/**
 * Per-label scores.
 *
 * A zero denominator yields `NaN` for that metric instead of a number:
 * precision is `NaN` for a label never predicted, recall for a label
 * absent from the scored set. F1 is `NaN` when either input is, and 0
 * when both are 0.
 */
export interface LabelScore {
    readonly label: Label;

    /** Entities with this label that were predicted correctly */
    readonly correct: number;

    /** Entities the tree assigned this label to */
    readonly predicted: number;

    /** Entities that carry this label */
    readonly actual: number;

    readonly precision: number;
    readonly recall: number;
    readonly f1: number;
}

export interface ScoreReport {
    /** Labels in first-seen order (actual before predicted) */
    readonly labels: readonly LabelScore[];
    readonly correct: number;
    readonly total: number;
    readonly accuracy: number;
}

interface Tally {
    correct: number;
    predicted: number;
    actual: number;
}

/**
 * Classify every entity and score the predictions against their labels.
 *
 * @throws EmptyInputError if `entities` is empty
 */
export function scoreAll(tree: TreeNode, entities: readonly LabeledEntity[]): ScoreReport {
    if (entities.length === 0) {
        throw new EmptyInputError("scoreAll");
    }

    const tallies = new Map<Label, Tally>();
    const tally = (label: Label): Tally => {
        let entry = tallies.get(label);
        if (!entry) {
            entry = { correct: 0, predicted: 0, actual: 0 };
            tallies.set(label, entry);
        }
        return entry;
    };

    let correct = 0;
    for (const entity of entities) {
        const actual = tally(entity.label);
        const predictedLabel = classify(tree, entity);
        const predicted = tally(predictedLabel);

        actual.actual++;
        predicted.predicted++;
        if (predictedLabel === entity.label) {
            actual.correct++;
            correct++;
        }
    }

    const labels = Array.from(tallies, ([label, t]): LabelScore => {
        const precision = ratio(t.correct, t.predicted);
        const recall = ratio(t.correct, t.actual);
        return { label, ...t, precision, recall, f1: harmonicMean(precision, recall) };
    });

    return {
        labels,
        correct,
        total   : entities.length,
        accuracy: correct / entities.length,
    };
}

function ratio(numerator: number, denominator: number): number {
    return denominator === 0 ? NaN : numerator / denominator;
}

function harmonicMean(precision: number, recall: number): number {
    if (Number.isNaN(precision) || Number.isNaN(recall)) {
        return NaN;
    }
    if (precision + recall === 0) {
        return 0;
    }
    return (2 * precision * recall) / (precision + recall);
}

function formatMetric(value: number): string {
    return Number.isNaN(value) ? "n/a" : value.toFixed(3);
}

/**
 * Render a report as text lines:
 *
 * ```
 * doc: prec=0.750(3/4), recl=1.000(3/3), F=0.857
 * code: prec=n/a(0/0), recl=0.000(0/1), F=n/a
 * 3/4
 * ```
 */
export function formatScoreReport(report: ScoreReport): string[] {
    const lines = report.labels.map((s) =>
        `${s.label}: prec=${formatMetric(s.precision)}(${s.correct}/${s.predicted}), ` +
        `recl=${formatMetric(s.recall)}(${s.correct}/${s.actual}), ` +
        `F=${formatMetric(s.f1)}`
    );
    lines.push(`${report.correct}/${report.total}`);
    return lines;
}
