/**
 * Error types surfaced by the streak core.
 *
 * Validation errors mean "nothing changed"; faults mean an internal defect was
 * detected and should be reported, not shown to chat users.
 */
export type StreakErrorCode =
  | 'VALIDATION'
  | 'DUPLICATE_TRIGGER'
  | 'UNKNOWN_RULE'
  | 'INVALID_TRIGGER'
  | 'UNKNOWN_EVENT'
  | 'NOT_UNDOABLE'
  | 'CONSISTENCY_FAULT'
  | 'PATTERN_COMPILE_FAULT';

export class StreakError extends Error {
  readonly code: StreakErrorCode;

  constructor(code: StreakErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

type ValidationCode = 'VALIDATION' | 'DUPLICATE_TRIGGER' | 'UNKNOWN_RULE' | 'INVALID_TRIGGER' | 'UNKNOWN_EVENT' | 'NOT_UNDOABLE';

export class ValidationError extends StreakError {
  constructor(message: string, code: ValidationCode = 'VALIDATION') {
    super(code, message);
  }
}

export class DuplicateTriggerError extends ValidationError {
  constructor(
    readonly chatId: string,
    readonly value: string,
  ) {
    super(`Trigger "${value}" already exists in chat ${chatId}`, 'DUPLICATE_TRIGGER');
  }
}

export class UnknownRuleError extends ValidationError {
  constructor(
    readonly chatId: string,
    readonly ruleName: string,
  ) {
    super(`Unknown rule "${ruleName}" in chat ${chatId}`, 'UNKNOWN_RULE');
  }
}

export class InvalidTriggerError extends ValidationError {
  constructor(readonly word: string) {
    super(`Trigger must be a single word made of letters, got "${word}"`, 'INVALID_TRIGGER');
  }
}

export class UnknownEventError extends ValidationError {
  constructor(
    readonly chatId: string,
    readonly eventId: number,
  ) {
    super(`Event #${eventId} does not exist in chat ${chatId}`, 'UNKNOWN_EVENT');
  }
}

/** The event is an UNDO, or was undone already */
export class NotUndoableError extends ValidationError {
  constructor(
    readonly eventId: number,
    readonly reason: 'IS_UNDO' | 'ALREADY_UNDONE',
  ) {
    super(
      reason === 'IS_UNDO'
        ? `Event #${eventId} is an undo and cannot itself be undone`
        : `Event #${eventId} has already been undone`,
      'NOT_UNDOABLE',
    );
  }
}

export class ConsistencyFault extends StreakError {
  constructor(
    readonly chatId: string,
    readonly detail: string,
  ) {
    super('CONSISTENCY_FAULT', `Projection for chat ${chatId} diverged from its event log: ${detail}`);
  }
}

export class PatternCompileFault extends StreakError {
  constructor(
    readonly source: string,
    cause: unknown,
  ) {
    super(
      'PATTERN_COMPILE_FAULT',
      `Generated pattern failed to compile (${cause instanceof Error ? cause.message : String(cause)}): ${source}`,
    );
  }
}
