import { describe, it, expect } from 'vitest';
import {
  denylistViolationError,
  pathEscapeError,
  rootInvalidError,
  sizeLimitExceededError,
} from '@cedar-mcp/path-guard';
import {
  ERROR_CODES,
  executionSuggestions,
  methodNotFound,
  serializeCommand,
  translateError,
} from '../src/core/adapters.js';
import { executionError, invalidParamsError, parseError } from '../src/domain/errors.js';

describe('translateError', () => {
  it('wraps path guard errors as security violations', () => {
    expect(translateError(pathEscapeError('../x'), 7)).toEqual({
      jsonrpc: '2.0',
      id: 7,
      error: {
        code: -32001,
        message: 'Security violation',
        data: {
          type: 'SecurityError',
          kind: 'PATH_ESCAPE',
          details: "Path escape attempt: '../x' resolves outside root directory",
          path: '../x',
          suggestions: [
            'Verify the path is within the project root',
            "Avoid '..' segments and symlinks that point outside the root",
          ],
        },
      },
    });
  });

  it('does not expose the resolved location of an escape', () => {
    const envelope = translateError(pathEscapeError('link/x', '/elsewhere/x'), 'req_1');
    expect(envelope.error.data).not.toHaveProperty('resolved');
  });

  it('adds the per-kind fields', () => {
    expect(translateError(denylistViolationError('.env', '.env'), null).error.data).toMatchObject({
      kind: 'DENYLIST_VIOLATION',
      pattern: '.env',
    });
    expect(translateError(sizeLimitExceededError('big.bin', 20, 10), null).error.data).toMatchObject({
      kind: 'SIZE_LIMIT_EXCEEDED',
      actual: 20,
      limit: 10,
    });
    expect(translateError(rootInvalidError('nope', 'not_found'), null).error.data).toMatchObject({
      kind: 'ROOT_INVALID',
      reason: 'not_found',
    });
  });

  it('reports parse errors with their position', () => {
    expect(translateError(parseError("Expected TO but found 'INTO'", 2, 15), 'req_1')).toMatchObject({
      id: 'req_1',
      error: {
        code: ERROR_CODES.PARSE_ERROR_CEDAR,
        message: 'CEDARScript parse error',
        data: { type: 'ParseError', details: "Expected TO but found 'INTO'", line: 2, column: 15 },
      },
    });
  });

  it('reports execution errors with the failing command', () => {
    expect(translateError(executionError('File not found: a.txt', 1), 'req_1')).toMatchObject({
      error: {
        code: -32003,
        message: 'CEDARScript execution failed',
        data: {
          type: 'ExecutionError',
          command_index: 1,
          details: 'File not found: a.txt',
          suggestions: [
            'Verify the file path is correct',
            'Check if file exists in project root',
            'Consider using CREATE command if file should be created',
          ],
        },
      },
    });
  });

  it('reports invalid parameters', () => {
    expect(translateError(invalidParamsError('content: Required'), 'req_1').error).toEqual({
      code: -32602,
      message: 'Invalid params',
      data: { type: 'InvalidParams', details: 'content: Required' },
    });
  });

  it('hides paths and stack traces of unexpected errors', () => {
    const envelope = translateError(new Error('boom at /home/user/project/file.txt'), 'req_1');
    expect(envelope.error).toEqual({
      code: -32603,
      message: 'Internal server error',
      data: { type: 'Error', details: 'boom at [PATH]' },
    });
  });
});

describe('executionSuggestions', () => {
  it('picks suggestions from the message', () => {
    expect(executionSuggestions("Marker not found in a.py: 'x'")[0]).toBe(
      'Re-analyze the file structure (it may have changed)'
    );
    expect(executionSuggestions('Destination already exists: b.txt')).toEqual([
      'Re-run parse_cedarscript to validate command syntax',
    ]);
  });
});

describe('methodNotFound', () => {
  it('builds a JSON-RPC method-not-found error', () => {
    expect(methodNotFound('rm_rf', 'req_9')).toEqual({
      jsonrpc: '2.0',
      id: 'req_9',
      error: {
        code: -32601,
        message: 'Method not found',
        data: { type: 'MethodNotFound', details: 'Unknown tool: rm_rf' },
      },
    });
  });
});

describe('serializeCommand', () => {
  it('includes only the fields each command has', () => {
    expect(
      serializeCommand({
        type: 'UpdateFile',
        target: 'a.py',
        action: { kind: 'insert_line', position: 'after', marker: 'm', content: 'c' },
        line: 3,
      })
    ).toEqual({
      type: 'UpdateFile',
      target: 'a.py',
      action: 'insert_line',
      position: 'after',
      marker: 'm',
      content: 'c',
      line: 3,
    });
    expect(
      serializeCommand({
        type: 'UpdateFile',
        target: 'a.py',
        action: { kind: 'delete_line', marker: 'm' },
        line: 1,
      })
    ).toEqual({ type: 'UpdateFile', target: 'a.py', action: 'delete_line', marker: 'm', line: 1 });
    expect(serializeCommand({ type: 'MoveFile', target: 'a', destination: 'b', line: 2 })).toEqual({
      type: 'MoveFile',
      target: 'a',
      destination: 'b',
      line: 2,
    });
  });
});
