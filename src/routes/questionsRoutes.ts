/**
 * Questions Routes
 */

import { Router } from 'express';
import { QuestionsController } from '../controllers/questionsController';

export function createQuestionsRoutes(controller: QuestionsController): Router {
  const router = Router();

  router.post('/question', (req, res, next) => controller.create(req, res, next));
  router.get('/questions', (req, res, next) => controller.list(req, res, next));
  router.delete('/question', (req, res, next) => controller.delete(req, res, next));

  return router;
}
