/**
 * Selection of correctly predicted examples
 *
 * Interpretation is usually restricted to windows the model already gets
 * right. These filters return the indices of such windows, either for one
 * task or for every column of a multi-task prediction matrix.
 *
 * @module operations/correct-predictions
 */

import { type } from "arktype";
import { ShapeMismatchError, ValidationError } from "../errors";
import type { CorrectPredictionOptions, SequenceWindow } from "../types";
import { CorrectPredictionOptionsSchema } from "../types";

const DEFAULT_PREDICTION_OPTIONS = {
  posThreshold: 0.5,
  labelKeyColumn: 3,
} as const;

type ResolvedPredictionOptions = CorrectPredictionOptions &
  Required<Pick<CorrectPredictionOptions, "posThreshold" | "labelKeyColumn">>;

/**
 * Anything that scores a batch of windows, one column per task
 */
export interface PredictionModel {
  predict(
    windows: readonly SequenceWindow[]
  ): readonly (readonly number[])[] | Promise<readonly (readonly number[])[]>;
}

/**
 * A label table cell: numeric, or text holding a number
 */
export type LabelCell = number | string | null | undefined;

function resolveOptions(options: CorrectPredictionOptions): ResolvedPredictionOptions {
  const merged = { ...DEFAULT_PREDICTION_OPTIONS, ...options };

  const validationResult = CorrectPredictionOptionsSchema(merged);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(`Invalid prediction options: ${validationResult.summary}`);
  }

  return merged;
}

/**
 * Indices of correct calls, ascending
 *
 * Index `i` is kept when `trueLabels[i] == 1` and the score is above
 * `posThreshold`, or, when `negThreshold` is given, when `trueLabels[i] == 0`
 * and the score is below it.
 *
 * @throws {ShapeMismatchError} When the two sequences differ in length
 *
 * @example
 * ```typescript
 * getCorrectPredictions([1, 0, 1, 0], [0.9, 0.2, 0.3, 0.6], {
 *   posThreshold: 0.5,
 *   negThreshold: 0.5,
 * }); // [0, 1]
 * ```
 */
export function getCorrectPredictions(
  trueLabels: readonly number[],
  predictedScores: readonly number[],
  options: CorrectPredictionOptions = {}
): number[] {
  const { posThreshold, negThreshold } = resolveOptions(options);

  if (trueLabels.length !== predictedScores.length) {
    throw new ShapeMismatchError(
      "Predicted scores do not match true labels",
      trueLabels.length,
      predictedScores.length
    );
  }

  const correct: number[] = [];
  trueLabels.forEach((label, i) => {
    const score = predictedScores[i] ?? Number.NaN;
    if (label === 1 && score > posThreshold) {
      correct.push(i);
    } else if (negThreshold !== undefined && label === 0 && score < negThreshold) {
      correct.push(i);
    }
  });

  return correct;
}

function toLabel(cell: LabelCell, row: number, column: number): number {
  const value = typeof cell === "number" ? cell : Number(cell ?? Number.NaN);
  if (cell === "" || Number.isNaN(value)) {
    throw new ValidationError(`Label at row ${row}, column ${column} is not numeric: '${cell}'`);
  }
  return value;
}

/**
 * Per-task correct calls over a prediction matrix
 *
 * Labels for task `t` are read from column `t + labelKeyColumn + 1` of the
 * label table.
 *
 * @param predictions - One row per example, one column per task
 * @param labelRows - Label table rows aligned with `predictions`
 * @returns Task index -> ascending indices of correct calls
 * @throws {ShapeMismatchError} When row counts or row widths disagree
 */
export function getCorrectPredictionsByTask(
  predictions: readonly (readonly number[])[],
  labelRows: readonly (readonly LabelCell[])[],
  options: CorrectPredictionOptions = {}
): Map<number, number[]> {
  const resolved = resolveOptions(options);

  if (predictions.length !== labelRows.length) {
    throw new ShapeMismatchError(
      "Label rows do not match prediction rows",
      predictions.length,
      labelRows.length
    );
  }

  const taskCount = predictions[0]?.length ?? 0;
  const byTask = new Map<number, number[]>();

  for (let task = 0; task < taskCount; task++) {
    const column = task + resolved.labelKeyColumn + 1;
    const scores: number[] = [];
    const labels: number[] = [];

    predictions.forEach((row, i) => {
      const score = row[task];
      const labelRow = labelRows[i] ?? [];
      if (score === undefined) {
        throw new ShapeMismatchError(`Prediction row ${i} is missing tasks`, taskCount, row.length);
      }
      if (column >= labelRow.length) {
        throw new ShapeMismatchError(`Label row ${i} is missing task columns`, column + 1, labelRow.length);
      }
      scores.push(score);
      labels.push(toLabel(labelRow[column], i, column));
    });

    byTask.set(task, getCorrectPredictions(labels, scores, resolved));
  }

  return byTask;
}

/**
 * Score windows with a model, then select correct calls per task
 */
export async function getCorrectPredictionsFromModel(
  model: PredictionModel,
  windows: readonly SequenceWindow[],
  labelRows: readonly (readonly LabelCell[])[],
  options: CorrectPredictionOptions = {}
): Promise<Map<number, number[]>> {
  const predictions = await model.predict(windows);
  return getCorrectPredictionsByTask(predictions, labelRows, options);
}
