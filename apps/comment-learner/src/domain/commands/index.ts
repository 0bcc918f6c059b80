/**
 * @fileoverview Commands barrel exports
 *
 * @module domain/commands
 */

export { runTraining, type TrainingOptions, type TrainingResult } from "./train.js";
export { runEvaluation, type EvaluationOptions, type EvaluationResult } from "./evaluate.js";
