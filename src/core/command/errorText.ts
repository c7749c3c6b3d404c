import {
  DuplicateTriggerError,
  InvalidTriggerError,
  NotUndoableError,
  UnknownEventError,
  UnknownRuleError,
  type ValidationError,
} from '../errors.js';

/**
 * Chat-facing text for a rejected request. Errors raised by command
 * handlers themselves already carry a user-facing message.
 */
export function validationText(error: ValidationError): string {
  if (error instanceof DuplicateTriggerError) return `触发词「${error.value}」已存在`;
  if (error instanceof UnknownRuleError) return `本群没有名为「${error.ruleName}」的触发词或规则`;
  if (error instanceof InvalidTriggerError) return `触发词必须是一个只由字母组成的词：${error.word}`;
  if (error instanceof UnknownEventError) return `事件 #${error.eventId} 不存在`;
  if (error instanceof NotUndoableError) {
    return error.reason === 'IS_UNDO' ? `事件 #${error.eventId} 是撤销记录，不能再撤销` : `事件 #${error.eventId} 已被撤销`;
  }
  return error.message;
}
