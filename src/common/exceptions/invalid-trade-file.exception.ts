import { BadRequestException } from '@nestjs/common';

// Trade file could not be read as a trade table (bad CSV, missing columns, no header).
// Row-level problems are diagnostics, not exceptions.
export class InvalidTradeFileException extends BadRequestException {
  constructor(message: string) {
    super(message, 'Invalid Trade File');
  }
}
