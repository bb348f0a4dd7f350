import { UrlUtils } from '../UrlUtils';

describe('UrlUtils', () => {
  describe('extractHost', () => {
    it('should return the host including an explicit port', () => {
      expect(UrlUtils.extractHost('https://example.com/a/b?c=d')).toBe('example.com');
      expect(UrlUtils.extractHost('http://localhost:8080/')).toBe('localhost:8080');
    });

    it('should return null for invalid URLs', () => {
      expect(UrlUtils.extractHost('not a url')).toBeNull();
      expect(UrlUtils.extractHost('')).toBeNull();
    });
  });

  describe('isHttpUrl', () => {
    it('should accept absolute http and https URLs', () => {
      expect(UrlUtils.isHttpUrl('http://example.com')).toBe(true);
      expect(UrlUtils.isHttpUrl('https://example.com/path')).toBe(true);
    });

    it('should reject other schemes and relative paths', () => {
      expect(UrlUtils.isHttpUrl('ftp://example.com/file')).toBe(false);
      expect(UrlUtils.isHttpUrl('mailto:team@example.com')).toBe(false);
      expect(UrlUtils.isHttpUrl('/about')).toBe(false);
      expect(UrlUtils.isHttpUrl('example.com')).toBe(false);
    });
  });

  describe('getRootUrl', () => {
    it('should keep the scheme and host only', () => {
      expect(UrlUtils.getRootUrl('https://example.com:8443/a/b?c=d#e')).toBe('https://example.com:8443');
    });

    it('should throw for invalid URLs', () => {
      expect(() => UrlUtils.getRootUrl('not a url')).toThrow();
    });
  });

  describe('getRobotsUrl', () => {
    it('should point at robots.txt on the same origin', () => {
      expect(UrlUtils.getRobotsUrl('http://example.com/deep/page.html')).toBe('http://example.com/robots.txt');
    });
  });
});
