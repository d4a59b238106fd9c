/**
 * Questions endpoint tests
 * Run the app against in-memory repositories
 */

import request from 'supertest';
import { validate as isUuid } from 'uuid';
import { createApp } from '../app';
import { OtherDBError } from '../db/errors';
import { createInMemoryRepositories } from './support/inMemoryRepositories';

const UNKNOWN_QUESTION_UUID = '6f1c2d3e-4b5a-4c6d-8e7f-9a0b1c2d3e4f';
const NON_V4_UUIDS = [
  '11111111-1111-1111-1111-111111111111',
  '00000000-0000-0000-0000-000000000001',
  '018f3c1e-7b2a-7c3d-9e4f-5a6b7c8d9e0f', // v7
];

function setup() {
  const repositories = createInMemoryRepositories();
  const app = createApp({
    questionsDao: repositories.questionsDao,
    answersDao: repositories.answersDao,
  });
  return { app, ...repositories };
}

describe('POST /question', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('returns 400 without touching the repository when title is empty', async () => {
    const { app, questionsDao } = setup();
    const createSpy = jest.spyOn(questionsDao, 'createQuestion');

    const res = await request(app).post('/question').send({ title: '', description: 'D' });

    expect(res.status).toBe(400);
    expect(res.body.error).toEqual({ code: 'BAD_REQUEST', message: 'Title is required' });
    expect(createSpy).not.toHaveBeenCalled();
  });

  it('returns 400 when description is empty', async () => {
    const { app, questionsDao } = setup();
    const createSpy = jest.spyOn(questionsDao, 'createQuestion');

    const res = await request(app).post('/question').send({ title: 'T', description: '' });

    expect(res.status).toBe(400);
    expect(res.body.error.message).toBe('Description is required');
    expect(createSpy).not.toHaveBeenCalled();
  });

  it('treats a missing field like an empty one', async () => {
    const { app } = setup();

    const res = await request(app).post('/question').send({ description: 'D' });

    expect(res.status).toBe(400);
    expect(res.body.error.message).toBe('Title is required');
  });

  it('returns the created question with a generated uuid and timestamp', async () => {
    const { app } = setup();

    const res = await request(app).post('/question').send({ title: 'T', description: 'D' });

    expect(res.status).toBe(200);
    expect(res.body.title).toBe('T');
    expect(res.body.description).toBe('D');
    expect(isUuid(res.body.question_uuid)).toBe(true);
    expect(res.body.created_at).toEqual(expect.any(String));
    expect(res.body.created_at.length).toBeGreaterThan(0);
  });

  it('returns 500 with the storage error message when the repository fails', async () => {
    const { app, questionsDao } = setup();
    jest
      .spyOn(questionsDao, 'createQuestion')
      .mockRejectedValue(new OtherDBError(new Error('connection refused')));

    const res = await request(app).post('/question').send({ title: 'T', description: 'D' });

    expect(res.status).toBe(500);
    expect(res.body.error).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'Database error: connection refused',
      details: { kind: 'Other' },
    });
  });

  it('returns 400 for a malformed JSON body', async () => {
    const { app } = setup();

    const res = await request(app)
      .post('/question')
      .set('Content-Type', 'application/json')
      .send('{"title":');

    expect(res.status).toBe(400);
    expect(res.body.error).toEqual({ code: 'BAD_REQUEST', message: 'Malformed JSON body' });
  });
});

describe('GET /questions', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('returns an empty list when there are no questions', async () => {
    const { app } = setup();

    const res = await request(app).get('/questions');

    expect(res.status).toBe(200);
    expect(res.body).toEqual([]);
  });

  it('includes a question after it is created', async () => {
    const { app } = setup();
    const created = await request(app).post('/question').send({ title: 'T', description: 'D' });

    const res = await request(app).get('/questions');

    expect(res.status).toBe(200);
    expect(res.body).toHaveLength(1);
    expect(res.body[0]).toEqual({
      question_uuid: created.body.question_uuid,
      title: 'T',
      description: 'D',
      created_at: created.body.created_at,
    });
    expect(isUuid(res.body[0].question_uuid)).toBe(true);
  });

  it('returns 500 when listing fails', async () => {
    const { app, questionsDao } = setup();
    jest
      .spyOn(questionsDao, 'getQuestions')
      .mockRejectedValue(new OtherDBError(new Error('timeout')));

    const res = await request(app).get('/questions');

    expect(res.status).toBe(500);
    expect(res.body.error.message).toBe('Database error: timeout');
  });
});

describe('DELETE /question', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('returns 400 when question_uuid is empty', async () => {
    const { app, questionsDao } = setup();
    const deleteSpy = jest.spyOn(questionsDao, 'deleteQuestion');

    const res = await request(app).delete('/question').send({ question_uuid: '' });

    expect(res.status).toBe(400);
    expect(res.body.error.message).toBe('Question UUID is required');
    expect(deleteSpy).not.toHaveBeenCalled();
  });

  it('returns 400 when question_uuid is not a UUID', async () => {
    const { app, questionsDao } = setup();
    const deleteSpy = jest.spyOn(questionsDao, 'deleteQuestion');

    const res = await request(app).delete('/question').send({ question_uuid: 'not-a-uuid' });

    expect(res.status).toBe(400);
    expect(res.body.error.message).toBe('Invalid question UUID');
    expect(deleteSpy).not.toHaveBeenCalled();
  });

  it('succeeds for a well-formed uuid that matches no question', async () => {
    const { app } = setup();

    const res = await request(app).delete('/question').send({ question_uuid: UNKNOWN_QUESTION_UUID });

    expect(res.status).toBe(200);
    expect(res.text).toBe('');
  });

  it('removes the question from the list', async () => {
    const { app } = setup();
    const created = await request(app).post('/question').send({ title: 'T', description: 'D' });

    const res = await request(app)
      .delete('/question')
      .send({ question_uuid: created.body.question_uuid });
    const list = await request(app).get('/questions');

    expect(res.status).toBe(200);
    expect(list.body).toEqual([]);
  });
});

describe('Service routes', () => {
  it('reports health', async () => {
    const { app } = setup();

    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('healthy');
  });

  it('returns 404 for unknown routes', async () => {
    const { app } = setup();

    const res = await request(app).get('/nope');

    expect(res.status).toBe(404);
    expect(res.body.error).toEqual({ code: 'NOT_FOUND', message: 'Route GET /nope not found' });
  });

  it('returns a generic 500 for errors that are not storage errors', async () => {
    const { app, questionsDao } = setup();
    jest.spyOn(questionsDao, 'getQuestions').mockRejectedValue(new Error('boom'));

    const res = await request(app).get('/questions');

    expect(res.status).toBe(500);
    expect(res.body.error).toEqual({
      code: 'INTERNAL_SERVER_ERROR',
      message: 'An unexpected error occurred',
    });
    jest.restoreAllMocks();
  });
});

describe('DELETE /question identifier formats', () => {
  it.each(NON_V4_UUIDS)('accepts %s regardless of version or variant', async (questionUuid) => {
    const { app } = setup();

    const res = await request(app).delete('/question').send({ question_uuid: questionUuid });

    expect(res.status).toBe(200);
  });

  it('accepts an upper-case uuid', async () => {
    const { app } = setup();

    const res = await request(app)
      .delete('/question')
      .send({ question_uuid: UNKNOWN_QUESTION_UUID.toUpperCase() });

    expect(res.status).toBe(200);
  });

  it.each(['6f1c2d3e4b5a4c6d8e7f9a0b1c2d3e4f', '{6f1c2d3e-4b5a-4c6d-8e7f-9a0b1c2d3e4f}', '6f1c2d3e-4b5a-4c6d-8e7f-9a0b1c2d3e4'])(
    'rejects %s',
    async (questionUuid) => {
      const { app } = setup();

      const res = await request(app).delete('/question').send({ question_uuid: questionUuid });

      expect(res.status).toBe(400);
      expect(res.body.error.message).toBe('Invalid question UUID');
    }
  );
});
