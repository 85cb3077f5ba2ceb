import { describe, it, expect } from 'vitest';
import {
  AppError,
  ConfigError,
  UsageError,
  PatternCompileError,
  FileIOError,
  isUserCorrectable,
} from './errors';

describe('AppError', () => {
  it('should create an error with code and message', () => {
    const error = new AppError('ConfigError', 'Test message');
    expect(error.code).toBe('ConfigError');
    expect(error.message).toBe('Test message');
    expect(error.name).toBe('AppError');
  });

  it('should accept optional cause and details', () => {
    const cause = new Error('Original error');
    const details = { key: 'value' };
    const error = new AppError('IOError', 'Test message', { cause, details });
    expect(error.cause).toBe(cause);
    expect(error.details).toEqual(details);
  });

  it('should accept string details', () => {
    const error = new AppError('UnknownError', 'Test', { details: 'string details' });
    expect(error.details).toBe('string details');
  });
});

describe('ConfigError', () => {
  it('should create a ConfigError with correct code', () => {
    const error = new ConfigError('Invalid config');
    expect(error.code).toBe('ConfigError');
    expect(error.message).toBe('Invalid config');
    expect(error.name).toBe('ConfigError');
  });
});

describe('UsageError', () => {
  it('should create a UsageError with correct code', () => {
    const error = new UsageError('Invalid usage');
    expect(error.code).toBe('UsageError');
    expect(error.message).toBe('Invalid usage');
  });
});

describe('PatternCompileError', () => {
  it('names the field and fragment', () => {
    const error = new PatternCompileError('search.path', '(var', 'Unterminated group');
    expect(error.code).toBe('PatternError');
    expect(error.message).toBe(
      'Config contains invalid regex "(var" in search.path: Unterminated group',
    );
    expect(error.field).toBe('search.path');
    expect(error.fragment).toBe('(var');
    expect(error.details).toEqual({ field: 'search.path', fragment: '(var' });
  });
});

describe('FileIOError', () => {
  it('includes the file and the cause message', () => {
    const cause = new Error('EACCES: permission denied');
    const error = new FileIOError('repo/.git/config', 'Failed to read', { cause });
    expect(error.code).toBe('IOError');
    expect(error.message).toBe('Failed to read repo/.git/config: EACCES: permission denied');
    expect(error.file).toBe('repo/.git/config');
    expect(error.cause).toBe(cause);
  });

  it('falls back when no cause is given', () => {
    const error = new FileIOError('a', 'Failed to write');
    expect(error.message).toBe('Failed to write a: unknown error');
  });
});

describe('isUserCorrectable', () => {
  it('classifies configuration, usage and pattern errors', () => {
    expect(isUserCorrectable(new ConfigError('x'))).toBe(true);
    expect(isUserCorrectable(new UsageError('x'))).toBe(true);
    expect(isUserCorrectable(new PatternCompileError('search.path', '(', 'bad'))).toBe(true);
    expect(isUserCorrectable(new FileIOError('f', 'Failed to read'))).toBe(false);
    expect(isUserCorrectable(new Error('plain'))).toBe(false);
  });
});
