/**
 * Command-line Parsing Tests
 */

import { parseArgs } from '../../src/cli/args.js';
import {
  duplicatesOptionsSchema,
  parseOptions,
  tagOptionsSchema,
  verifyOptionsSchema,
} from '../../src/validation/cliSchemas.js';
import { ValidationError } from '../../src/errors/index.js';

describe('parseArgs', () => {
  it('should split command, positionals and options', () => {
    expect(parseArgs(['tag', 'a.mp4', '--workers', '4', 'dir'])).toEqual({
      command: 'tag',
      positionals: ['a.mp4', 'dir'],
      options: { workers: '4' },
    });
  });

  it('should accept --name=value', () => {
    expect(parseArgs(['verify', '--concurrency=2', 'x.mp4']).options).toEqual({ concurrency: '2' });
  });

  it('should treat help and version as flags', () => {
    expect(parseArgs(['--help', 'tag'])).toEqual({ command: 'tag', positionals: [], options: { help: true } });
    expect(parseArgs(['-v']).options).toEqual({ version: true });
  });

  it('should pass everything after -- through as positionals', () => {
    expect(parseArgs(['tag', '--', '--weird-name.mp4']).positionals).toEqual(['--weird-name.mp4']);
  });

  it('should leave the command undefined for an empty argv', () => {
    expect(parseArgs([])).toEqual({ command: undefined, positionals: [], options: {} });
  });
});

describe('cli schemas', () => {
  it('should coerce the worker count', () => {
    expect(parseOptions(tagOptionsSchema, { paths: ['a.mp4'], workers: '3' }, 'tag')).toEqual({
      paths: ['a.mp4'],
      workers: 3,
    });
  });

  it('should require at least one path for tag', () => {
    expect(() => parseOptions(tagOptionsSchema, { paths: [] }, 'tag')).toThrow(
      'invalid tag options: paths: tag needs at least one file or directory'
    );
  });

  it('should reject a negative worker count as a ValidationError', () => {
    expect(() => parseOptions(tagOptionsSchema, { paths: ['a'], workers: '-1' }, 'tag')).toThrow(ValidationError);
  });

  it('should reject a worker flag given without a number', () => {
    expect(() => parseOptions(tagOptionsSchema, { paths: ['a'], workers: true }, 'tag')).toThrow(
      'invalid tag options: workers: workers needs a number'
    );
  });

  it('should reject a concurrency that is not numeric', () => {
    expect(() => parseOptions(verifyOptionsSchema, { paths: ['a'], concurrency: 'many' }, 'verify')).toThrow(
      'invalid verify options: concurrency: concurrency needs a number'
    );
  });

  it('should default the duplicates directory to the current one', () => {
    expect(parseOptions(duplicatesOptionsSchema, { directory: undefined }, 'duplicates')).toEqual({ directory: '.' });
  });

  it('should reject a zero verify concurrency', () => {
    expect(() => parseOptions(verifyOptionsSchema, { paths: ['a'], concurrency: '0' }, 'verify')).toThrow(
      'invalid verify options: concurrency: concurrency must be at least 1'
    );
  });
});
