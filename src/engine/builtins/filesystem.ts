import type { BuiltinCommand, CommandResult } from '../types';
import type { VfsNode } from '../../types';
import { resolvePath } from '../../vfs/resolver';
import style from '../../terminal/style';
import {
  formatShellError,
  isADirectory,
  missingArgument,
  notADirectory,
  notFound,
  type ShellError,
} from '../errors';

const decoder = new TextDecoder('utf-8');

function failure(error: ShellError): CommandResult {
  return {
    stdout: '',
    stderr: formatShellError(error),
    exitCode: 1,
    error,
  };
}

function formatFileName(node: VfsNode, color: boolean): string {
  if (node.type === 'directory') {
    return color ? style.blue(`${node.name}/`) : `${node.name}/`;
  }
  return node.name;
}

export const ls: BuiltinCommand = (args, context) => {
  const target = args[0] ?? '';
  const resolved = resolvePath(context.tree, context.cwd, target);

  if (!resolved.ok) {
    // ls with no operand always resolves (cwd), so `target` is non-empty here
    return failure(
      resolved.reason === 'NotFound' ? notFound('ls', target) : notADirectory('ls', target)
    );
  }

  // A file operand lists just itself, as typed
  if (resolved.node.type === 'file') {
    return {
      stdout: target,
      stderr: '',
      exitCode: 0
    };
  }

  const entries = context.tree.list(resolved.node);
  return {
    stdout: entries.map(node => formatFileName(node, context.color ?? false)).join('  '),
    stderr: '',
    exitCode: 0
  };
};

export const cd: BuiltinCommand = (args, context) => {
  const target = args[0];
  if (target === undefined) {
    return failure(missingArgument('cd'));
  }

  const resolved = resolvePath(context.tree, context.cwd, target);
  if (!resolved.ok) {
    return failure(
      resolved.reason === 'NotFound' ? notFound('cd', target) : notADirectory('cd', target)
    );
  }

  if (resolved.node.type !== 'directory') {
    return failure(notADirectory('cd', target));
  }

  return {
    stdout: '',
    stderr: '',
    exitCode: 0,
    cwd: resolved.node.path
  };
};

export const cat: BuiltinCommand = (args, context) => {
  const target = args[0];
  if (target === undefined) {
    return failure(missingArgument('cat'));
  }

  const resolved = resolvePath(context.tree, context.cwd, target);
  if (!resolved.ok) {
    return failure(
      resolved.reason === 'NotFound' ? notFound('cat', target) : notADirectory('cat', target)
    );
  }

  if (resolved.node.type === 'directory') {
    return failure(isADirectory('cat', target));
  }

  let stdout = decoder.decode(resolved.node.content);

  // Remove trailing newline, the terminal adds its own
  if (stdout.endsWith('\n')) {
    stdout = stdout.slice(0, -1);
  }

  return {
    stdout,
    stderr: '',
    exitCode: 0
  };
};
