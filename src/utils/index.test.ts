import { getTimezoneFromCoordinates } from './index';
import { find } from 'geo-tz';

// Mock the geo-tz module
jest.mock('geo-tz', () => ({
  find: jest.fn(),
}));

describe('getTimezoneFromCoordinates', () => {
  let consoleErrorSpy: jest.SpyInstance;

  beforeEach(() => {
    (find as jest.Mock).mockReset();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
  });

  it('should return the first timezone geo-tz finds (Lyon)', () => {
    (find as jest.Mock).mockReturnValue(['Europe/Paris']);
    const timezone = getTimezoneFromCoordinates(45.7605, 4.8407);
    expect(timezone).toBe('Europe/Paris');
    expect(find).toHaveBeenCalledWith(45.7605, 4.8407);
  });

  it('should return the first of several candidate timezones', () => {
    (find as jest.Mock).mockReturnValue(['Asia/Shanghai', 'Asia/Urumqi']);
    expect(getTimezoneFromCoordinates(43.8, 87.6)).toBe('Asia/Shanghai');
  });

  it('should return "UTC" when geo-tz returns an empty array', () => {
    (find as jest.Mock).mockReturnValue([]);
    const timezone = getTimezoneFromCoordinates(0, 0);
    expect(timezone).toBe('UTC');
    expect(find).toHaveBeenCalledWith(0, 0);
  });

  it('should return "UTC" and log an error if geo-tz throws an error', () => {
    (find as jest.Mock).mockImplementation(() => {
      throw new Error('Test geo-tz error');
    });
    const timezone = getTimezoneFromCoordinates(10, 10);
    expect(timezone).toBe('UTC');
    expect(consoleErrorSpy).toHaveBeenCalledWith('Error finding timezone:', expect.any(Error));
  });
});
