export class ValidationError extends Error {
  public statusCode = 400;
  public details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

export type ChartErrorCode =
  | 'INSUFFICIENT_ITEMS'
  | 'MISSING_START_DATE'
  | 'MISSING_RESOURCE'
  | 'RESOURCE_OUT_OF_RANGE'
  | 'DATE_OUT_OF_RANGE';

/**
 * Base class for schedules that are well-formed documents but cannot be laid out.
 */
export class ChartValidationError extends ValidationError {
  public code: ChartErrorCode;

  constructor(code: ChartErrorCode, message: string, details?: Record<string, unknown>) {
    super(message, { code, ...details });
    this.name = 'ChartValidationError';
    this.code = code;
  }
}

export class InsufficientItemsError extends ChartValidationError {
  constructor(itemCount: number) {
    super('INSUFFICIENT_ITEMS', 'You must provide more than one task', { itemCount });
    this.name = 'InsufficientItemsError';
  }
}

export class MissingAnchorError extends ChartValidationError {
  constructor(field: 'startDate' | 'resource') {
    super(
      field === 'startDate' ? 'MISSING_START_DATE' : 'MISSING_RESOURCE',
      field === 'startDate'
        ? 'First item must contain a start date'
        : 'First item must contain a resource index',
      { itemIndex: 0, field }
    );
    this.name = 'MissingAnchorError';
  }
}

export class ResourceOutOfRangeError extends ChartValidationError {
  public itemIndex: number;
  public resource: number;

  constructor(itemIndex: number, resource: number, resourceCount: number) {
    super('RESOURCE_OUT_OF_RANGE', 'Resource index is out of range', {
      itemIndex,
      resource,
      resourceCount,
    });
    this.name = 'ResourceOutOfRangeError';
    this.itemIndex = itemIndex;
    this.resource = resource;
  }
}

export class DateOutOfRangeError extends ChartValidationError {
  public itemIndex: number;

  constructor(itemIndex: number) {
    super('DATE_OUT_OF_RANGE', 'Schedule extends past the last representable date', {
      itemIndex,
    });
    this.name = 'DateOutOfRangeError';
    this.itemIndex = itemIndex;
  }
}
