/**
 * Text classifier interface.
 * Each instance predicts one label from a fixed set, with a score in [0, 1].
 */

export interface Classification {
  label: string;
  score: number;
}

export interface ITextClassifier {
  readonly labels: readonly string[];
  classify(text: string): Promise<Classification>;
}
