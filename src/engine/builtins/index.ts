import { ls, cd, cat } from './filesystem';
import { exit } from './exit';

export { ls, cd, cat, exit };

export const BUILTIN_COMMANDS = {
  ls,
  cd,
  cat,
  exit,
} as const;

export type BuiltinName = keyof typeof BUILTIN_COMMANDS;
