/**
 * Questions Controller
 * HTTP handlers for creating, listing and deleting questions
 */

import { Request, Response, NextFunction } from 'express';
import { QuestionsDao } from '../db/repositories';
import { toHandlerError } from '../middleware/errorHandler';
import { readStringField, requireNonEmpty, requireUUID } from '../middleware/validation';

export class QuestionsController {
  constructor(private readonly questionsDao: QuestionsDao) {}

  /**
   * POST /question
   */
  async create(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const title = readStringField(req.body, 'title');
      const description = readStringField(req.body, 'description');
      requireNonEmpty(title, 'Title is required');
      requireNonEmpty(description, 'Description is required');

      const question = await this.questionsDao.createQuestion({ title, description });
      res.json(question);
    } catch (error) {
      next(toHandlerError(error));
    }
  }

  /**
   * GET /questions
   */
  async list(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const questions = await this.questionsDao.getQuestions();
      res.json(questions);
    } catch (error) {
      next(toHandlerError(error));
    }
  }

  /**
   * DELETE /question
   */
  async delete(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const questionUuid = readStringField(req.body, 'question_uuid');
      requireNonEmpty(questionUuid, 'Question UUID is required');
      requireUUID(questionUuid, 'Invalid question UUID');

      await this.questionsDao.deleteQuestion(questionUuid);
      res.status(200).end();
    } catch (error) {
      next(toHandlerError(error));
    }
  }
}
