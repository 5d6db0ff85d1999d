import { describe, it, expect } from 'vitest';

import {
  ConfigError,
  HyperEnumError,
  OutputError,
  SchemaError,
  isHyperEnumError,
  toHyperEnumError,
} from '../errors.js';
import { ErrorCode, getExitCode } from '../../errors/codes.js';
import { ErrorPresenter } from '../../errors/presenter.js';

describe('Error hierarchy', () => {
  it('defaults subclass error codes', () => {
    expect(new ConfigError({ message: 'm' }).errorCode).toBe(
      ErrorCode.CONFIGURATION_ERROR
    );
    expect(new SchemaError({ message: 'm' }).errorCode).toBe(
      ErrorCode.INVALID_SCHEMA_STRUCTURE
    );
    expect(new OutputError({ message: 'm' }).errorCode).toBe(
      ErrorCode.OUTPUT_FAILED
    );
  });

  it('keeps name, severity, context and cause', () => {
    const cause = new Error('disk full');
    const error = new OutputError({
      message: 'cannot write',
      context: { entity: 'Game' },
      cause,
    });

    expect(error.name).toBe('OutputError');
    expect(error.severity).toBe('error');
    expect(error.context).toEqual({ entity: 'Game' });
    expect(error.cause).toBe(cause);
    expect(error).toBeInstanceOf(HyperEnumError);
  });

  it('serializes with a stack only in dev', () => {
    const error = new ConfigError({
      message: 'bad splits',
      errorCode: ErrorCode.INVALID_SPLITS,
    });

    expect(error.toJSON('dev').stack).toBeDefined();
    const prod = error.toJSON('prod');
    expect(prod.stack).toBeUndefined();
    expect(prod).toMatchObject({
      name: 'ConfigError',
      message: 'bad splits',
      errorCode: 'E302',
    });
  });

  it('maps error codes to exit codes', () => {
    const error = new ConfigError({
      message: 'empty',
      errorCode: ErrorCode.EMPTY_SELECTION,
    });
    expect(error.getExitCode()).toBe(51);
    expect(getExitCode(ErrorCode.INTERNAL_ERROR)).toBe(99);
  });

  it('wraps foreign errors as internal errors', () => {
    const wrapped = toHyperEnumError(new TypeError('boom'));
    expect(isHyperEnumError(wrapped)).toBe(true);
    expect(wrapped.errorCode).toBe(ErrorCode.INTERNAL_ERROR);
    expect(wrapped.message).toBe('boom');

    const same = new SchemaError({ message: 'x' });
    expect(toHyperEnumError(same)).toBe(same);
    expect(toHyperEnumError('plain').message).toBe('plain');
  });
});

describe('ErrorPresenter', () => {
  it('formats a CLI view with location and cause', () => {
    const presenter = new ErrorPresenter('prod', {
      colors: false,
      terminalWidth: 60,
    });
    const view = presenter.formatForCLI(
      new OutputError({
        message: 'cannot write',
        context: { entity: 'Game', path: '/tmp/out' },
        cause: new Error('EACCES'),
      })
    );

    expect(view.title).toBe('Error E400: cannot write');
    expect(view.location).toBe('Location: game "Game", /tmp/out');
    expect(view.cause).toBe('EACCES');
    expect(view.terminalWidth).toBe(60);
  });

  it('uses the context suggestion as workaround', () => {
    const presenter = new ErrorPresenter('prod', { colors: false });
    const view = presenter.formatForCLI(
      new ConfigError({
        message: 'no games',
        context: { suggestion: 'pass --game' },
      })
    );
    expect(view.workaround).toBe('pass --game');
    expect(view.location).toBeUndefined();
  });
});
