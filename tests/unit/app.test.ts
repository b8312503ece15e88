import { createApp } from '@/app';

jest.mock('@/logger', () => ({
  logger: {
    error: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
  },
}));

describe('createApp (unit)', () => {
  const app = createApp({ getWeather: jest.fn() });

  it('does not trust forwarded headers', () => {
    expect(app.get('trust proxy')).toBe(false);
  });

  it('does not advertise the framework', () => {
    expect(app.get('x-powered-by')).toBe(false);
  });
});
