/**
 * Answers Controller
 * HTTP handlers for answers, each scoped to a question
 */

import { Request, Response, NextFunction } from 'express';
import { AnswersDao } from '../db/repositories';
import { logger } from '../utils/logger';
import { readStringField, readBodyOrQueryField, requireNonEmpty, requireUUID } from '../middleware/validation';
import { toHandlerError } from '../middleware/errorHandler';

export class AnswersController {
  constructor(private readonly answersDao: AnswersDao) {}

  /**
   * POST /answer
   * An unknown question_uuid is rejected by the store and reported as a 500.
   */
  async create(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const questionUuid = readStringField(req.body, 'question_uuid');
      const content = readStringField(req.body, 'content');
      requireNonEmpty(content, 'Content is required');
      requireUUID(questionUuid, 'Invalid question UUID');

      const answer = await this.answersDao.createAnswer({ question_uuid: questionUuid, content });
      logger.debug('Answer created', { answerUuid: answer.answer_uuid, questionUuid });
      res.json(answer);
    } catch (error) {
      next(toHandlerError(error));
    }
  }

  /**
   * GET /answers
   */
  async list(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const questionUuid = readBodyOrQueryField(req, 'question_uuid');
      requireNonEmpty(questionUuid, 'Question UUID is required');
      requireUUID(questionUuid, 'Invalid question UUID');

      const answers = await this.answersDao.getAnswers(questionUuid);
      res.json(answers);
    } catch (error) {
      next(toHandlerError(error));
    }
  }

  /**
   * DELETE /answer
   */
  async delete(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const answerUuid = readStringField(req.body, 'answer_uuid');
      requireNonEmpty(answerUuid, 'Answer UUID is required');
      requireUUID(answerUuid, 'Invalid answer UUID');

      await this.answersDao.deleteAnswer(answerUuid);
      res.status(200).end();
    } catch (error) {
      next(toHandlerError(error));
    }
  }
}
