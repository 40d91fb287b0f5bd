import { NotFoundError, SchemaError, ValidationError, WriteError, type EtlError } from '../errors';
import { logAndMapError, methodNotAllowed, toErrorResponse } from '../httpErrors';

describe('toErrorResponse', () => {
  const cases: Array<[EtlError, number, boolean]> = [
    [new ValidationError('E101', 'Column missing.'), 400, false],
    [new SchemaError('E201', 'Key missing.'), 400, false],
    [new NotFoundError('a.csv'), 404, true],
    [new WriteError('a.json', 'denied'), 502, true]
  ];

  test.each(cases)('%s → %i', (err, status, retryable) => {
    const response = toErrorResponse(err);

    expect(response.status).toBe(status);
    expect(response.body.error).toBe(err.message);
    expect(response.body.error_codes).toEqual([err.code]);
    expect(response.body.retryable).toBe(retryable);
  });

  test('anything else is an internal error without details', () => {
    expect(toErrorResponse(new Error('db password wrong'))).toEqual({
      status: 500,
      body: {
        error: 'Internal backend processing failure.',
        error_codes: ['E607'],
        retryable: false
      }
    });
  });

  test('method not allowed is E603', () => {
    expect(methodNotAllowed('POST')).toEqual({
      status: 405,
      body: { error: 'Method not allowed. Use POST.', error_codes: ['E603'] }
    });
  });
});

describe('logAndMapError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('logs engine errors as warnings', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    logAndMapError('clean', new NotFoundError('a.csv'));

    expect(warn).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(warn.mock.calls[0][0]))).toEqual({
      level: 'warn',
      service: 'bom-etl',
      event: 'request_rejected',
      endpoint: 'clean',
      status: 404,
      error_codes: ['E301'],
      error_name: 'NotFoundError',
      error_message: 'File "a.csv" was not found.'
    });
  });

  test('logs internal failures as errors', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const response = logAndMapError('lookup', 'boom');

    expect(response.status).toBe(500);
    expect(JSON.parse(String(error.mock.calls[0][0]))).toMatchObject({
      level: 'error',
      event: 'request_failed',
      endpoint: 'lookup',
      error_message: 'boom'
    });
  });
});
