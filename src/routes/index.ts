/**
 * Routes Index
 */

import { Router } from 'express';
import { AnswersDao, QuestionsDao } from '../db/repositories';
import { QuestionsController } from '../controllers/questionsController';
import { AnswersController } from '../controllers/answersController';
import { createQuestionsRoutes } from './questionsRoutes';
import { createAnswersRoutes } from './answersRoutes';

export interface RouteDependencies {
  questionsDao: QuestionsDao;
  answersDao: AnswersDao;
}

export function createApiRoutes({ questionsDao, answersDao }: RouteDependencies): Router {
  const router = Router();

  router.use(createQuestionsRoutes(new QuestionsController(questionsDao)));
  router.use(createAnswersRoutes(new AnswersController(answersDao)));

  // Health check
  router.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
