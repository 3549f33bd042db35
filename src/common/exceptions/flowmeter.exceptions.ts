import {
  BadRequestException,
  InternalServerErrorException,
} from '@nestjs/common';

/**
 * Request body is not JSON, or carries no data
 */
export class MalformedRequestException extends BadRequestException {
  constructor(message = 'No JSON data received') {
    super(message);
  }
}

export class MissingDeviceIdException extends BadRequestException {
  constructor(message = 'Device ID is required') {
    super(message);
  }
}

export class InvalidDeviceIdException extends BadRequestException {
  constructor(message: string) {
    super(message);
  }
}

export type DateFilterField = 'start_date' | 'end_date';

export class InvalidDateFormatException extends BadRequestException {
  constructor(readonly field: DateFilterField) {
    super(`Invalid ${field} format. Use ISO format.`);
  }
}

/**
 * Any failure talking to the database.
 *
 * Callers only ever see the fixed message; driver detail goes to the log.
 */
export class StorageException extends InternalServerErrorException {
  constructor(message = 'Internal server error') {
    super(message);
  }
}
