import type { Statement } from "../Syntax.ts";
import type { ExecutionContext } from "./ExecutionContext.ts";
import { dim, erase, optionBase } from "./Arrays.ts";
import { let_, midAssign, swap } from "./Assignment.ts";
import { gosub, goto, ifStatement, on, returnStatement } from "./Branch.ts";
import { chain, clear, cls, common, defFn, end, merge, noop, randomize, run, stop, troff, tron, width } from "./Control.ts";
import { data, read, restore } from "./Data.ts";
import { error, onError, resume } from "./Errors.ts";
import { close, field, getRecord, justifiedSet, kill, name, open, putRecord } from "./FileSystem.ts";
import { forStatement, next } from "./For.ts";
import { input, lineInput } from "./Input.ts";
import { print, printUsing, write } from "./Print.ts";
import { whileStatement, wend } from "./While.ts";

// Runs one statement.  Statements that transfer control set runtime.nextPc or
// halt the runtime; errors are thrown as RuntimeError.
export function execute(statement: Statement, context: ExecutionContext): void {
  switch (statement.kind) {
    case 'rem':
    case 'defType':
      return;
    case 'print': return print(statement, context);
    case 'printUsing': return printUsing(statement, context);
    case 'write': return write(statement, context);
    case 'input': return input(statement, context);
    case 'lineInput': return lineInput(statement, context);
    case 'let': return let_(statement, context);
    case 'if': return ifStatement(statement, context);
    case 'goto': return goto(statement, context);
    case 'gosub': return gosub(statement, context);
    case 'return': return returnStatement(statement, context);
    case 'on': return on(statement, context);
    case 'for': return forStatement(statement, context);
    case 'next': return next(statement, context);
    case 'while': return whileStatement(statement, context);
    case 'wend': return wend(statement, context);
    case 'end': return end(statement, context);
    case 'stop': return stop(statement, context);
    case 'data': return data(statement, context);
    case 'read': return read(statement, context);
    case 'restore': return restore(statement, context);
    case 'dim': return dim(statement, context);
    case 'erase': return erase(statement, context);
    case 'optionBase': return optionBase(statement, context);
    case 'defFn': return defFn(statement, context);
    case 'onError': return onError(statement, context);
    case 'resume': return resume(statement, context);
    case 'error': return error(statement, context);
    case 'swap': return swap(statement, context);
    case 'clear': return clear(statement, context);
    case 'cls': return cls(statement, context);
    case 'randomize': return randomize(statement, context);
    case 'tron': return tron(statement, context);
    case 'troff': return troff(statement, context);
    case 'width': return width(statement, context);
    case 'noop': return noop(statement, context);
    case 'open': return open(statement, context);
    case 'close': return close(statement, context);
    case 'field': return field(statement, context);
    case 'get': return getRecord(statement, context);
    case 'put': return putRecord(statement, context);
    case 'lset':
    case 'rset':
      return justifiedSet(statement, context);
    case 'midAssign': return midAssign(statement, context);
    case 'chain': return chain(statement, context);
    case 'common': return common(statement, context);
    case 'kill': return kill(statement, context);
    case 'name': return name(statement, context);
    case 'merge': return merge(statement, context);
    case 'run': return run(statement, context);
  }
}
