export type CardMakerErrorCode =
  | 'RESOURCE_NOT_FOUND'
  | 'CONFIG_INVALID'
  | 'UNKNOWN_CATEGORY_VALUE'
  | 'TEXT_OVERFLOW'
  | 'RECORD_INVALID';

/**
 * Base class for every failure a single card render can surface. Batch callers
 * catch these per record and keep going.
 */
export class CardMakerError extends Error {
  constructor(
    message: string,
    readonly code: CardMakerErrorCode
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ResourceNotFoundError extends CardMakerError {
  constructor(
    readonly logicalPath: string,
    readonly searched: readonly string[]
  ) {
    super(
      `Required resource not found: "${logicalPath}" (searched ${searched.join(', ') || 'nothing'})`,
      'RESOURCE_NOT_FOUND'
    );
  }
}

export class ConfigValidationError extends CardMakerError {
  constructor(
    readonly path: string,
    readonly reason: string
  ) {
    super(`Invalid card configuration at "${path || '<root>'}": ${reason}`, 'CONFIG_INVALID');
  }
}

export type CategoryName = 'school' | 'component' | 'indicator' | 'class';

export class UnknownCategoryValueError extends CardMakerError {
  constructor(
    readonly category: CategoryName,
    readonly value: string
  ) {
    super(`Unknown ${category} "${value}": no entry in the card configuration`, 'UNKNOWN_CATEGORY_VALUE');
  }
}

export interface OverflowDetails {
  field?: string;
  minSize: number;
  requiredHeight: number;
  availableHeight: number;
}

export class TextOverflowError extends CardMakerError {
  readonly field?: string;
  readonly minSize: number;
  readonly requiredHeight: number;
  readonly availableHeight: number;

  constructor(details: OverflowDetails) {
    const target = details.field ? `Field "${details.field}"` : 'Text';
    super(
      `${target} does not fit at minimum size ${details.minSize} ` +
        `(needs ${Math.ceil(details.requiredHeight)}px, box is ${details.availableHeight}px)`,
      'TEXT_OVERFLOW'
    );
    this.field = details.field;
    this.minSize = details.minSize;
    this.requiredHeight = details.requiredHeight;
    this.availableHeight = details.availableHeight;
  }

  withField(field: string): TextOverflowError {
    return new TextOverflowError({
      field,
      minSize: this.minSize,
      requiredHeight: this.requiredHeight,
      availableHeight: this.availableHeight,
    });
  }
}

export class RecordValidationError extends CardMakerError {
  constructor(
    readonly spell: string,
    readonly path: string,
    readonly reason: string
  ) {
    super(`Invalid spell entry "${spell}" at "${path || '<root>'}": ${reason}`, 'RECORD_INVALID');
  }
}
