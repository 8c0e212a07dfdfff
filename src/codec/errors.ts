export type CodecOperation = 'encode' | 'decode';

export class DegenerateInputError extends Error {
  readonly operation: CodecOperation;
  readonly length: number;

  constructor(message: string, operation: CodecOperation, length: number) {
    super(message);
    this.name = 'DegenerateInputError';
    this.operation = operation;
    this.length = length;
  }
}
