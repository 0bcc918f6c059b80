/**
 * @fileoverview Unit tests for TreeBuilder
 *
 * Tests cover:
 * - Stopping rules (entropy, size, no discerning feature)
 * - Winner selection and registration-order tie-break
 * - Leaves for stopped partitions, default labels on branches
 * - Training-set consistency when growing a full tree
 * - Error propagation and debug tracing
 *
 * @module @comment-tree/engine/__tests__/TreeBuilder
 */

import { describe, it, expect, vi } from "vitest";
import { TreeBuilder } from "../engine/TreeBuilder.js";
import { exportTree } from "../engine/TreeCodec.js";
import { classify } from "../engine/Evaluator.js";
import { FeatureRegistry } from "../features/FeatureRegistry.js";
import { createEntity, type LabeledEntity } from "../contracts/Entity.js";
import { EmptyInputError } from "../contracts/Errors.js";
import type { Feature } from "../contracts/Feature.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { isBranch } from "../contracts/TreeNode.js";

function createMockLogger(): EngineLogger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

const quantitativeSample = (): LabeledEntity[] => [
    createEntity("v1", { value: 1 }, "A"),
    createEntity("v2a", { value: 2 }, "A"),
    createEntity("v2b", { value: 2 }, "A"),
    createEntity("v5", { value: 5 }, "B"),
    createEntity("v9", { value: 9 }, "B"),
];

/**
 * Comment records with distinct feature values.
 */
const commentSample = (): LabeledEntity[] => [
    createEntity("c1", { type: "line", tags: "todo,fixme", depth: 1 }, "note"),
    createEntity("c2", { type: "line", tags: "doc", depth: 4 }, "doc"),
    createEntity("c3", { type: "block", tags: "doc,param", depth: 2 }, "doc"),
    createEntity("c4", { type: "block", tags: "todo", depth: 7 }, "note"),
    createEntity("c5", { type: "line", tags: "license", depth: 0 }, "header"),
    createEntity("c6", { type: "block", tags: "license,doc", depth: 0 }, "header"),
    createEntity("c7", { type: "line", tags: "doc,todo", depth: 3 }, "note"),
];

const commentRegistry = () =>
    FeatureRegistry.fromSpecs([
        { kind: "discrete", attribute: "type" },
        { kind: "membership", attribute: "tags" },
        { kind: "membership-indexed", attribute: "tags", size: 1 },
        { kind: "quantitative", attribute: "depth" },
    ]);

describe("TreeBuilder", () => {
    describe("stopping rules", () => {
        // Scenario: Empty input is a precondition violation
        it("should throw EmptyInputError on an empty set", () => {
            const builder = new TreeBuilder(commentRegistry(), { logger: createMockLogger() });

            expect(() => builder.build([])).toThrow(EmptyInputError);
        });

        // Scenario: Pure sets stop at the default entropy threshold
        it("should return null when entropy is below the threshold", () => {
            const builder = new TreeBuilder(commentRegistry(), { minEntities: 1, logger: createMockLogger() });
            const entities = commentSample().filter((e) => e.label === "doc");

            expect(builder.build(entities)).toBeNull();
        });

        it("should return null when the set is smaller than minEntities", () => {
            const builder = new TreeBuilder(commentRegistry(), { logger: createMockLogger() });

            // 7 entities, default minimum is 10
            expect(builder.build(commentSample())).toBeNull();
        });

        it("should return null when no feature can split the set", () => {
            const registry = FeatureRegistry.fromSpecs([{ kind: "discrete", attribute: "missing" }]);
            const builder = new TreeBuilder(registry, { minEntities: 1, logger: createMockLogger() });

            expect(builder.build(commentSample())).toBeNull();
        });

        // Scenario: train() always yields a tree
        it("should train a single leaf with the majority label when the root stops", () => {
            const builder = new TreeBuilder(commentRegistry(), { logger: createMockLogger() });

            expect(builder.train(commentSample())).toEqual({ kind: "leaf", label: "note" });
        });
    });

    describe("splitting", () => {
        it("should build a branch on the threshold with leaves for pure partitions", () => {
            const registry = FeatureRegistry.fromSpecs([{ kind: "quantitative", attribute: "value" }]);
            const builder = new TreeBuilder(registry, { minEntities: 1, logger: createMockLogger() });

            const root = builder.build(quantitativeSample());

            expect(root).not.toBeNull();
            expect(root && exportTree(root)).toEqual(["QF:value", 5, "A", [["lt", "A"], ["ge", "B"]]]);
        });

        it("should record the majority label of the subset as the branch default", () => {
            const registry = FeatureRegistry.fromSpecs([{ kind: "discrete", attribute: "type" }]);
            const builder = new TreeBuilder(registry, { minEntities: 1, minEntropy: 0, logger: createMockLogger() });

            const root = builder.build([
                createEntity("1", { type: "a" }, "B"),
                createEntity("2", { type: "b" }, "A"),
                createEntity("3", { type: "c" }, "A"),
            ]);

            expect(root && exportTree(root)).toEqual([
                "DF:type",
                null,
                "A",
                [["a", "B"], ["b", "A"], ["c", "A"]],
            ]);
        });

        // Scenario: Lowest weighted entropy wins
        it("should select the feature with the lowest weighted entropy", () => {
            const registry = FeatureRegistry.fromSpecs([
                { kind: "discrete", attribute: "color" },
                { kind: "membership", attribute: "tags" },
            ]);
            const builder = new TreeBuilder(registry, { minEntities: 1, logger: createMockLogger() });

            const root = builder.build([
                createEntity("1", { color: "red", tags: "x" }, "A"),
                createEntity("2", { color: "red", tags: "y" }, "B"),
                createEntity("3", { color: "blue", tags: "x,z" }, "A"),
                createEntity("4", { color: "blue", tags: "z" }, "B"),
            ]);

            expect(root && isBranch(root) && root.feature.name).toBe("MF:tags");
            expect(root && isBranch(root) && root.arg).toBe("x");
        });

        // Scenario: Equal entropy goes to the earliest registered feature
        it("should break ties by registration order", () => {
            const entities = [
                createEntity("1", { kind: "k1", type: "t1" }, "A"),
                createEntity("2", { kind: "k2", type: "t2" }, "B"),
            ];
            const logger = createMockLogger();

            const typeFirst = new TreeBuilder(
                FeatureRegistry.fromSpecs([
                    { kind: "discrete", attribute: "type" },
                    { kind: "discrete", attribute: "kind" },
                ]),
                { minEntities: 1, logger }
            ).build(entities);
            const kindFirst = new TreeBuilder(
                FeatureRegistry.fromSpecs([
                    { kind: "discrete", attribute: "kind" },
                    { kind: "discrete", attribute: "type" },
                ]),
                { minEntities: 1, logger }
            ).build(entities);

            expect(typeFirst && isBranch(typeFirst) && typeFirst.feature.name).toBe("DF:type");
            expect(kindFirst && isBranch(kindFirst) && kindFirst.feature.name).toBe("DF:kind");
        });

        it("should recurse into impure partitions", () => {
            const registry = FeatureRegistry.fromSpecs([
                { kind: "discrete", attribute: "type" },
                { kind: "quantitative", attribute: "depth" },
            ]);
            const builder = new TreeBuilder(registry, { minEntities: 1, logger: createMockLogger() });

            const root = builder.build([
                createEntity("1", { type: "line", depth: 0 }, "header"),
                createEntity("2", { type: "line", depth: 5 }, "note"),
                createEntity("3", { type: "line", depth: 6 }, "note"),
                createEntity("4", { type: "block", depth: 0 }, "doc"),
                createEntity("5", { type: "block", depth: 9 }, "doc"),
            ]);

            // type: (3·H(1,2) + 2·0)/5 ≈ 0.551; depth cut at 5: (2·H(1,1) + 3·H(2,1))/5 ≈ 0.951
            expect(root && exportTree(root)).toEqual([
                "DF:type",
                null,
                "note",
                [
                    ["line", ["QF:depth", 5, "note", [["lt", "header"], ["ge", "note"]]]],
                    ["block", "doc"],
                ],
            ]);
        });

        // Scenario: Only InvalidSplitError is swallowed
        it("should propagate errors other than InvalidSplitError", () => {
            const broken: Feature = {
                name      : "XF:broken",
                attribute : "broken",
                kind      : "discrete",
                extract   : () => undefined,
                split     : () => {
                    throw new Error("boom");
                },
                identify  : () => null,
                isValidArg: () => true,
            };
            const registry = new FeatureRegistry().register(broken);
            const builder = new TreeBuilder(registry, { minEntities: 1, logger: createMockLogger() });

            expect(() => builder.build(commentSample())).toThrow("boom");
        });
    });

    describe("consistency", () => {
        // Scenario: A fully grown tree reproduces every training label
        it("should classify every training entity as its own label", () => {
            const entities = commentSample();
            const builder = new TreeBuilder(commentRegistry(), {
                minEntropy : 0,
                minEntities: 1,
                logger     : createMockLogger(),
            });

            const root = builder.train(entities);

            for (const entity of entities) {
                expect(classify(root, entity)).toBe(entity.label);
            }
        });

        it("should build identical trees from identical input", () => {
            const config = { minEntropy: 0, minEntities: 1, logger: createMockLogger() };

            const first = new TreeBuilder(commentRegistry(), config).train(commentSample());
            const second = new TreeBuilder(commentRegistry(), config).train(commentSample());

            expect(exportTree(second)).toEqual(exportTree(first));
        });
    });

    describe("logging", () => {
        it("should trace nodes at debug level", () => {
            const logger = createMockLogger();
            const registry = FeatureRegistry.fromSpecs([{ kind: "quantitative", attribute: "value" }]);

            new TreeBuilder(registry, { minEntities: 1, logger }).build(quantitativeSample());

            expect(logger.debug).toHaveBeenCalledWith("Build", expect.objectContaining({
                depth   : 0,
                entities: 5,
                counts  : { A: 3, B: 2 },
            }));
            expect(logger.debug).toHaveBeenCalledWith("Feature QF:value", expect.objectContaining({
                arg    : 5,
                entropy: 0,
            }));
            // two-space indent for depth 1, then the stop message
            expect(logger.debug).toHaveBeenCalledWith("   Too little entropy. Stopping.", { depth: 1 });
        });

        // Scenario: A library caller without a logger sees no output
        it("should stay silent when no logger is given", () => {
            const spies = [
                vi.spyOn(console, "log").mockImplementation(() => undefined),
                vi.spyOn(console, "debug").mockImplementation(() => undefined),
                vi.spyOn(console, "info").mockImplementation(() => undefined),
                vi.spyOn(console, "warn").mockImplementation(() => undefined),
                vi.spyOn(console, "error").mockImplementation(() => undefined),
            ];

            new TreeBuilder(commentRegistry()).train(commentSample());

            for (const spy of spies) {
                expect(spy).not.toHaveBeenCalled();
            }
            vi.restoreAllMocks();
        });

        it("should report a single-leaf training result at info level", () => {
            const logger = createMockLogger();
            const builder = new TreeBuilder(commentRegistry(), { logger });

            builder.train(commentSample());

            expect(logger.info).toHaveBeenCalledWith("No split at root; tree is a single leaf", {
                entities: 7,
                label   : "note",
            });
        });
    });
});
