/**
 * Boundary to external inference and training services.
 *
 * The core only ever asks for a single top-1 label per image; model loading,
 * ranking and batching stay behind these interfaces.
 */

import { InferenceError } from '../errors.js';
import type { ClassLabel } from '../types.js';

/**
 * An image classifier. Implementations may answer synchronously or not.
 * Failures should be raised as InferenceError; anything else thrown is
 * wrapped by predictLabel().
 */
export interface ClassifierPort {
  predict(imagePath: string): ClassLabel | Promise<ClassLabel>;
}

export interface TrainingData {
  trainRoot: string;
  valRoot: string;
}

/**
 * Opaque training service: consumes split folders, yields a classifier.
 */
export interface ModelTrainer {
  train(data: TrainingData): Promise<ClassifierPort>;
}

/**
 * Adapt a plain function to ClassifierPort.
 *
 * @example
 * ```ts
 * const classifier = new FunctionClassifier((path) => myModel.top1(path));
 * ```
 */
export class FunctionClassifier implements ClassifierPort {
  private readonly fn: (imagePath: string) => ClassLabel | Promise<ClassLabel>;

  constructor(fn: (imagePath: string) => ClassLabel | Promise<ClassLabel>) {
    this.fn = fn;
  }

  predict(imagePath: string): ClassLabel | Promise<ClassLabel> {
    return this.fn(imagePath);
  }
}

/**
 * Call the classifier and normalize its outcome: a non-empty label, or an
 * InferenceError for this image.
 */
export async function predictLabel(classifier: ClassifierPort, imagePath: string): Promise<ClassLabel> {
  let label: unknown;
  try {
    label = await classifier.predict(imagePath);
  } catch (e) {
    if (e instanceof InferenceError) throw e;
    throw new InferenceError(imagePath, e);
  }
  if (typeof label !== 'string' || label.length === 0) {
    throw new InferenceError(imagePath, new TypeError(`Classifier returned ${JSON.stringify(label) ?? String(label)} instead of a label`));
  }
  return label;
}
