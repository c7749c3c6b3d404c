/**
 * Builtin commands available by default
 */
import type { CommandHandler } from '../types.js';
import { CounterCommand } from './counter.js';
import { HelpCommand } from './help.js';
import { HistoryCommand } from './history.js';
import { LeaderboardCommand } from './leaderboard.js';
import { AddWordCommand, DisableRuleCommand, EnableRuleCommand, RemoveWordCommand } from './manageWords.js';
import { ResetCommand } from './reset.js';
import { TriggersCommand } from './triggers.js';
import { UndoCommand } from './undo.js';

export {
  AddWordCommand,
  CounterCommand,
  DisableRuleCommand,
  EnableRuleCommand,
  HelpCommand,
  HistoryCommand,
  LeaderboardCommand,
  RemoveWordCommand,
  ResetCommand,
  TriggersCommand,
  UndoCommand,
};

export const builtinCommands: CommandHandler[] = [
  HelpCommand,
  CounterCommand,
  LeaderboardCommand,
  HistoryCommand,
  TriggersCommand,
  ResetCommand,
  UndoCommand,
  AddWordCommand,
  RemoveWordCommand,
  EnableRuleCommand,
  DisableRuleCommand,
];

/** Every name a builtin answers to, aliases included */
export const builtinCommandNames: string[] = builtinCommands.flatMap((cmd) => [cmd.name, ...(cmd.aliases ?? [])]);
