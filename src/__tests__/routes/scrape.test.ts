import request from 'supertest';
import { mock, MockProxy } from 'jest-mock-extended';
import { createApp } from '../../app';
import { CallerInputError, ExtractionEmptyError } from '../../middleware/errorHandler';
import { ScrapeService } from '../../services/scrape.service';
import { IPermissionEvaluator } from '../../services/scraper/interfaces/IPermissionEvaluator';
import { EntityRecord } from '../../types/entity';

const record: EntityRecord = {
  id: 'entity-1',
  name: 'Green Loop',
  entity_type: 'social_enterprise',
  slug: 'green-loop',
  website: 'https://greenloop.example',
  contact_email: 'Unknown',
  created_at: '2026-03-01T10:00:00.000Z',
  updated_at: '2026-03-01T10:00:00.000Z',
};

describe('HTTP API', () => {
  let scrapeService: MockProxy<ScrapeService>;
  let permissionEvaluator: MockProxy<IPermissionEvaluator>;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    scrapeService = mock<ScrapeService>();
    permissionEvaluator = mock<IPermissionEvaluator>();
    app = createApp({ scrapeService, permissionEvaluator });
  });

  describe('POST /scrape', () => {
    it('should report a created record', async () => {
      scrapeService.process.mockResolvedValue({ operation: 'created', record });

      const response = await request(app).post('/scrape').send({ url: 'https://greenloop.example' });

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        status: 'success',
        message: 'Data created successfully',
        data: record,
      });
      expect(typeof response.body.execution_time).toBe('number');
      expect(scrapeService.process).toHaveBeenCalledWith('https://greenloop.example');
    });

    it('should report an updated record', async () => {
      scrapeService.process.mockResolvedValue({ operation: 'updated', record });

      const response = await request(app).post('/scrape').send({ url: 'https://greenloop.example' });

      expect(response.body.message).toBe('Data updated successfully');
    });

    it('should require a url', async () => {
      const response = await request(app).post('/scrape').send({ link: 'https://greenloop.example' });

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({ status: 'error', message: 'Missing URL parameter' });
      expect(scrapeService.process).not.toHaveBeenCalled();
    });

    it('should answer 400 with the message of caller input errors', async () => {
      scrapeService.process.mockRejectedValue(new CallerInputError('Empty URL provided'));

      const response = await request(app).post('/scrape').send({ url: '' });

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({ status: 'error', message: 'Empty URL provided' });
    });

    it('should answer 500 for pipeline failures', async () => {
      scrapeService.process.mockRejectedValue(new ExtractionEmptyError());

      const response = await request(app).post('/scrape').send({ url: 'https://greenloop.example' });

      expect(response.status).toBe(500);
      expect(response.body).toMatchObject({
        status: 'error',
        message: 'Data processing failed: No substantial content found on page',
      });
    });

    it('should reject malformed JSON bodies', async () => {
      const response = await request(app)
        .post('/scrape')
        .set('Content-Type', 'application/json')
        .send('{"url": ');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ status: 'fail', message: 'Malformed JSON body' });
    });
  });

  describe('POST /check-permission', () => {
    it('should return the decision for the trimmed URL', async () => {
      permissionEvaluator.evaluate.mockResolvedValue({ allowed: false, reason: 'Blocked by robots.txt' });

      const response = await request(app).post('/check-permission').send({ url: '  https://greenloop.example/  ' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        url: 'https://greenloop.example/',
        scraping_allowed: false,
        message: 'Blocked by robots.txt',
      });
      expect(permissionEvaluator.evaluate).toHaveBeenCalledWith('https://greenloop.example/');
    });

    it('should require a url', async () => {
      const response = await request(app).post('/check-permission').send({});

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'Missing URL parameter' });
    });

    it('should answer 500 when the evaluator fails unexpectedly', async () => {
      permissionEvaluator.evaluate.mockRejectedValue(new Error('boom'));

      const response = await request(app).post('/check-permission').send({ url: 'https://greenloop.example' });

      expect(response.status).toBe(500);
      expect(response.body).toEqual({ status: 'error', message: 'Internal server error' });
    });
  });

  describe('GET /health', () => {
    it('should report healthy', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('healthy');
      expect(typeof response.body.timestamp).toBe('string');
    });
  });

  it('should answer 404 for unknown routes', async () => {
    const response = await request(app).get('/entities');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: 'Resource not found' });
  });
});
