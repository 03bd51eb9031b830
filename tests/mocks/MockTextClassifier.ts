/**
 * Fixed-answer text classifier.
 */

import type { Classification, ITextClassifier } from '../../src/providers/ITextClassifier.js';

export class MockTextClassifier implements ITextClassifier {
  readonly inputs: string[] = [];
  private result: Classification | Error;

  constructor(
    result: Classification | Error,
    readonly labels: readonly string[] = ['POSITIVE', 'NEGATIVE']
  ) {
    this.result = result;
  }

  respond(result: Classification | Error): void {
    this.result = result;
  }

  async classify(text: string): Promise<Classification> {
    this.inputs.push(text);
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}
