import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { ErrorPresenter } from '../../errors/presenter';
import { ErrorCode } from '../../errors/codes';
import {
  ConfigError,
  SchemaError,
  ValidationError,
  createValidationFailure,
} from '../../types/errors';

describe('ErrorPresenter', () => {
  const origEnv = { ...process.env };

  beforeEach(() => {
    process.env.NO_COLOR = '';
    process.env.FORCE_COLOR = '';
  });

  afterEach(() => {
    process.env = { ...origEnv };
  });

  const failures = [
    createValidationFailure(
      '/server',
      'missing required property "host" (no default in schema)',
      'required',
      '#/properties/server/required',
      { missingProperty: 'host' }
    ),
    createValidationFailure('/server/port', 'must be integer', 'type', '#/properties/server/properties/port/type'),
    createValidationFailure('', 'must NOT have additional properties', 'additionalProperties', '#/additionalProperties'),
  ];

  test('CLI view lists every failure with its path', () => {
    const presenter = new ErrorPresenter('dev', { colors: false, terminalWidth: 100 });
    const view = presenter.formatForCLI(new ValidationError({ failures }));

    expect(view.code).toBe(ErrorCode.CONFIG_VALIDATION_FAILED);
    expect(view.title).toBe(
      'Error E200: Config validation failed at /server: missing required property "host" (no default in schema) (and 2 more)'
    );
    expect(view.location).toBe('Location: /server');
    expect(view.failures).toEqual([
      '/server: missing required property "host" (no default in schema)',
      '/server/port: must be integer',
      '(root): must NOT have additional properties',
    ]);
    expect(view.omittedFailures).toBe(0);
    expect(view.workaround).toBe('Set "host" in the config, or give the schema a default for it');
    expect(view.colors).toBe(false);
    expect(view.terminalWidth).toBe(100);
  });

  test('CLI view caps the failure list', () => {
    const presenter = new ErrorPresenter('dev', { maxFailures: 1 });
    const view = presenter.formatForCLI(new ValidationError({ failures }));
    expect(view.failures).toEqual([
      '/server: missing required property "host" (no default in schema)',
    ]);
    expect(view.omittedFailures).toBe(2);
  });

  test('schema errors point at the schema path', () => {
    const err = new SchemaError({
      message: 'Invalid schema node',
      context: { schemaPath: '#/properties/name' },
    });
    const view = new ErrorPresenter('dev').formatForCLI(err);
    expect(view.location).toBe('Location: #/properties/name');
    expect(view.failures).toEqual([]);
    expect(view.workaround).toBeUndefined();
  });

  test('config errors fall back to the file', () => {
    const err = new ConfigError({
      message: 'Could not read config file app.yaml',
      context: { setting: 'path', file: 'app.yaml' },
    });
    const view = new ErrorPresenter('dev').formatForCLI(err);
    expect(view.location).toBe('File: app.yaml');
  });

  test('NO_COLOR disables colors and FORCE_COLOR enables them', () => {
    const err = new ConfigError({ message: 'x' });
    process.env.NO_COLOR = '1';
    expect(new ErrorPresenter('dev', { colors: true }).formatForCLI(err).colors).toBe(false);

    process.env.NO_COLOR = '';
    process.env.FORCE_COLOR = '1';
    expect(new ErrorPresenter('prod', { colors: false }).formatForCLI(err).colors).toBe(true);
  });

  test('colors default to the environment', () => {
    const err = new ConfigError({ message: 'x' });
    expect(new ErrorPresenter('dev').formatForCLI(err).colors).toBe(true);
    expect(new ErrorPresenter('prod').formatForCLI(err).colors).toBe(false);
  });
});
