import nock from 'nock';
import { RobotsTxtService } from '../RobotsTxtService';

describe('RobotsTxtService', () => {
  const userAgent = 'TestBot/1.0';
  const robotsTxt = `
User-agent: *
Disallow: /private/
Allow: /
`;

  let robotsTxtService: RobotsTxtService;

  beforeEach(() => {
    robotsTxtService = new RobotsTxtService({ userAgent, timeout: 1000 });
  });

  it('should follow the rules of a fetched robots.txt', async () => {
    nock('https://example.com')
      .get('/robots.txt')
      .times(2)
      .reply(200, robotsTxt);

    expect(await robotsTxtService.isAllowed('https://example.com/private/report')).toBe(false);
    expect(await robotsTxtService.isAllowed('https://example.com/about')).toBe(true);
  });

  it('should fetch robots.txt on every check', async () => {
    const scope = nock('https://example.com')
      .get('/robots.txt')
      .reply(200, robotsTxt)
      .get('/robots.txt')
      .reply(200, 'User-agent: *\nDisallow: /\n');

    expect(await robotsTxtService.isAllowed('https://example.com/about')).toBe(true);
    expect(await robotsTxtService.isAllowed('https://example.com/about')).toBe(false);
    expect(scope.isDone()).toBe(true);
  });

  it('should send the configured user agent', async () => {
    const scope = nock('https://example.com', { reqheaders: { 'User-Agent': userAgent } })
      .get('/robots.txt')
      .reply(200, robotsTxt);

    await robotsTxtService.isAllowed('https://example.com/');

    expect(scope.isDone()).toBe(true);
  });

  it('should request robots.txt from the same host and port', async () => {
    const scope = nock('http://localhost:8080')
      .get('/robots.txt')
      .reply(200, robotsTxt);

    expect(await robotsTxtService.isAllowed('http://localhost:8080/private/x')).toBe(false);
    expect(scope.isDone()).toBe(true);
  });

  describe('when robots.txt cannot be read', () => {
    it('should allow when the file is missing', async () => {
      nock('https://example.com').get('/robots.txt').reply(404);

      expect(await robotsTxtService.isAllowed('https://example.com/private/report')).toBe(true);
    });

    it('should allow when the fetch fails', async () => {
      nock('https://example.com').get('/robots.txt').replyWithError('connect ECONNREFUSED');

      expect(await robotsTxtService.isAllowed('https://example.com/private/report')).toBe(true);
    });

    it('should allow when the URL is not parseable', async () => {
      expect(await robotsTxtService.isAllowed('not a url')).toBe(true);
    });

    it('should deny in closed fail mode', async () => {
      const strict = new RobotsTxtService({ userAgent, timeout: 1000, failMode: 'closed' });
      nock('https://example.com')
        .get('/robots.txt').reply(503)
        .get('/robots.txt').replyWithError('socket hang up');

      expect(await strict.isAllowed('https://example.com/about')).toBe(false);
      expect(await strict.isAllowed('https://example.com/about')).toBe(false);
      expect(await strict.isAllowed('not a url')).toBe(false);
    });
  });
});
