import { AuditError, ServiceError, StorageError, WeatherFetchError } from '@/errors';

describe('error taxonomy (unit)', () => {
  it('builds not-found weather failures', () => {
    const error = WeatherFetchError.notFound('Atlantis');

    expect(error).toBeInstanceOf(ServiceError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('WeatherFetchError');
    expect(error.family).toBe('weather');
    expect(error.statusCode).toBe(404);
    expect(error.message).toBe('City not found: Atlantis');
    expect(error.cause).toBeUndefined();
  });

  it('keeps the wrapped cause', () => {
    const cause = new Error('ECONNREFUSED');
    const error = WeatherFetchError.unavailable('Unable to connect to weather service', cause);

    expect(error.statusCode).toBe(503);
    expect(error.cause).toBe(cause);
  });

  it.each([
    ['storage', 500],
    ['connection', 503],
    ['data', 400],
    ['permission', 403],
    ['cache', 500],
  ] as const)('maps storage kind %s to %i', (kind, status) => {
    const error = new StorageError(kind);

    expect(error.family).toBe('storage');
    expect(error.kind).toBe(kind);
    expect(error.statusCode).toBe(status);
    expect(error.message.length).toBeGreaterThan(0);
  });

  it.each([
    ['audit', 500],
    ['connection', 503],
    ['data', 400],
    ['permission', 403],
  ] as const)('maps audit kind %s to %i', (kind, status) => {
    const error = new AuditError(kind);

    expect(error.family).toBe('audit');
    expect(error.name).toBe('AuditError');
    expect(error.statusCode).toBe(status);
  });

  it('keeps storage and audit hierarchies apart', () => {
    expect(new AuditError('permission')).not.toBeInstanceOf(StorageError);
    expect(new StorageError('permission')).not.toBeInstanceOf(AuditError);
  });
});
