/**
 * Answers Routes
 */

import { Router } from 'express';
import { AnswersController } from '../controllers/answersController';

export function createAnswersRoutes(controller: AnswersController): Router {
  const router = Router();

  router.post('/answer', (req, res, next) => controller.create(req, res, next));
  router.get('/answers', (req, res, next) => controller.list(req, res, next));
  router.delete('/answer', (req, res, next) => controller.delete(req, res, next));

  return router;
}
