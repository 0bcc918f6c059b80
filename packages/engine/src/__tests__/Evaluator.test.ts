/**
 * @fileoverview Unit tests for the Evaluator
 *
 * Tests cover:
 * - classify() routing and default-label fallback
 * - scoreAll() per-label precision/recall/F1 and accuracy
 * - The NaN policy for zero denominators
 * - formatScoreReport() text
 *
 * @module @comment-tree/engine/__tests__/Evaluator
 */

import { describe, it, expect } from "vitest";
import { classify, scoreAll, formatScoreReport } from "../engine/Evaluator.js";
import { DiscreteFeature } from "../features/DiscreteFeature.js";
import { QuantitativeFeature } from "../features/QuantitativeFeature.js";
import { createEntity } from "../contracts/Entity.js";
import { EmptyInputError } from "../contracts/Errors.js";
import type { BranchValue } from "../contracts/Feature.js";
import { createBranch, createLeaf, type TreeNode } from "../contracts/TreeNode.js";

const typeTree = (children: [BranchValue, TreeNode][], defaultLabel = "A") =>
    createBranch(new DiscreteFeature("type"), null, defaultLabel, new Map(children));

describe("classify", () => {
    it("should return a leaf's label directly", () => {
        expect(classify(createLeaf("doc"), createEntity("1", {}, "other"))).toBe("doc");
    });

    it("should route through nested branches", () => {
        const tree = typeTree([
            ["line", createBranch(new QuantitativeFeature("depth"), 3, "note", new Map<BranchValue, TreeNode>([
                ["lt", createLeaf("header")],
                ["ge", createLeaf("note")],
            ]))],
            ["block", createLeaf("doc")],
        ]);

        expect(classify(tree, createEntity("1", { type: "line", depth: 1 }, "?"))).toBe("header");
        expect(classify(tree, createEntity("2", { type: "line", depth: 3 }, "?"))).toBe("note");
        expect(classify(tree, createEntity("3", { type: "block", depth: 0 }, "?"))).toBe("doc");
    });

    // Scenario: Unseen branch values fall back to the default label
    it("should return the branch default for an unseen branch value", () => {
        const tree = typeTree([["line", createLeaf("B")], ["block", createLeaf("C")]], "A");

        expect(classify(tree, createEntity("1", { type: "doc" }, "?"))).toBe("A");
        expect(classify(tree, createEntity("2", {}, "?"))).toBe("A");
    });

    it("should fall back at the deepest branch that misses", () => {
        const tree = typeTree([
            ["line", createBranch(new QuantitativeFeature("depth"), 3, "note", new Map<BranchValue, TreeNode>([
                ["lt", createLeaf("header")],
                ["ge", createLeaf("note")],
            ]))],
        ], "doc");

        // No depth: "un" is not a child of the inner branch
        expect(classify(tree, createEntity("1", { type: "line" }, "?"))).toBe("note");
    });
});

describe("scoreAll", () => {
    // Scenario: A constant predictor
    it("should score a single-label predictor", () => {
        const entities = [
            createEntity("1", {}, "L"),
            createEntity("2", {}, "M"),
            createEntity("3", {}, "L"),
            createEntity("4", {}, "N"),
        ];

        const report = scoreAll(createLeaf("L"), entities);
        const [l, m, n] = report.labels;

        expect(report.accuracy).toBe(0.5);
        expect(report.correct).toBe(2);
        expect(report.total).toBe(4);
        expect(report.labels.map((s) => s.label)).toEqual(["L", "M", "N"]);

        expect(l.precision).toBe(report.accuracy);
        expect(l.recall).toBe(1);
        expect(m.recall).toBe(0);
        expect(n.recall).toBe(0);
    });

    // Scenario: Zero denominators produce NaN, not a crash
    it("should report NaN precision for labels never predicted", () => {
        const report = scoreAll(createLeaf("L"), [createEntity("1", {}, "L"), createEntity("2", {}, "M")]);
        const m = report.labels[1];

        expect(m).toEqual({
            label    : "M",
            correct  : 0,
            predicted: 0,
            actual   : 1,
            precision: NaN,
            recall   : 0,
            f1       : NaN,
        });
    });

    it("should report NaN recall for labels predicted but absent", () => {
        const report = scoreAll(createLeaf("L"), [createEntity("1", {}, "M")]);

        expect(report.labels.map((s) => s.label)).toEqual(["M", "L"]);
        expect(report.labels[1].precision).toBe(0);
        expect(report.labels[1].recall).toBeNaN();
        expect(report.labels[1].f1).toBeNaN();
    });

    it("should report F1 of 0 when precision and recall are both 0", () => {
        const tree = typeTree([["a", createLeaf("B")], ["b", createLeaf("A")]]);

        const report = scoreAll(tree, [
            createEntity("1", { type: "a" }, "A"),
            createEntity("2", { type: "b" }, "B"),
        ]);

        expect(report.labels[0]).toMatchObject({ label: "A", precision: 0, recall: 0, f1: 0 });
        expect(report.accuracy).toBe(0);
    });

    it("should compute per-label precision, recall and F1", () => {
        const tree = typeTree([["a", createLeaf("A")], ["b", createLeaf("B")]], "A");

        const report = scoreAll(tree, [
            createEntity("1", { type: "a" }, "A"),
            createEntity("2", { type: "a" }, "B"),
            createEntity("3", { type: "b" }, "B"),
            createEntity("4", { type: "c" }, "A"),
        ]);

        const [a, b] = report.labels;
        expect(a).toMatchObject({ label: "A", correct: 2, predicted: 3, actual: 2, recall: 1 });
        expect(a.precision).toBeCloseTo(2 / 3, 10);
        expect(a.f1).toBeCloseTo(0.8, 10);
        expect(b).toMatchObject({ label: "B", correct: 1, predicted: 1, actual: 2, precision: 1, recall: 0.5 });
        expect(b.f1).toBeCloseTo(2 / 3, 10);
        expect(report.accuracy).toBe(0.75);
    });

    it("should throw EmptyInputError on an empty set", () => {
        expect(() => scoreAll(createLeaf("L"), [])).toThrow(EmptyInputError);
    });
});

describe("formatScoreReport", () => {
    it("should render one line per label and the overall count", () => {
        const tree = typeTree([["a", createLeaf("A")], ["b", createLeaf("B")]], "A");
        const report = scoreAll(tree, [
            createEntity("1", { type: "a" }, "A"),
            createEntity("2", { type: "a" }, "B"),
            createEntity("3", { type: "b" }, "B"),
            createEntity("4", { type: "c" }, "A"),
        ]);

        expect(formatScoreReport(report)).toEqual([
            "A: prec=0.667(2/3), recl=1.000(2/2), F=0.800",
            "B: prec=1.000(1/1), recl=0.500(1/2), F=0.667",
            "3/4",
        ]);
    });

    it("should render undefined metrics as n/a", () => {
        const report = scoreAll(createLeaf("L"), [createEntity("1", {}, "L"), createEntity("2", {}, "M")]);

        expect(formatScoreReport(report)).toEqual([
            "L: prec=0.500(1/2), recl=1.000(1/1), F=0.667",
            "M: prec=n/a(0/0), recl=0.000(0/1), F=n/a",
            "1/2",
        ]);
    });
});
