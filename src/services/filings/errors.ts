import { NotFoundError } from '../../utils/errors';

export class FilingNotFoundError extends NotFoundError {
  constructor(public companyName: string) {
    super(`No 10-K filing found for "${companyName}"`, 'FILING_NOT_FOUND');
    this.name = 'FilingNotFoundError';
  }
}
