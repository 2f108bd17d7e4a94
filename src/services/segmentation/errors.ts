/**
 * Segmentation failures. Both are unprocessable-document conditions, kept as
 * separate classes so callers can tell a missing section anchor from a
 * missing bold key.
 */

import { UnprocessableEntityError } from '../../utils/errors';

export class SequenceNotFoundError extends UnprocessableEntityError {
  constructor(
    public sequence: string,
    message = `Sequence "${sequence}" could not be found in the document`
  ) {
    super(message, 'SEQUENCE_NOT_FOUND');
    this.name = 'SequenceNotFoundError';
  }
}

export class KeyNotFoundError extends UnprocessableEntityError {
  constructor(
    public key: string,
    message = `Bold key "${key}" is missing and no fallback matched`
  ) {
    super(message, 'KEY_NOT_FOUND');
    this.name = 'KeyNotFoundError';
  }
}
