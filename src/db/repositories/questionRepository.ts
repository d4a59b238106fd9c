/**
 * Question Repository
 * Create, list and delete questions
 */

import type { Queryable } from '../index';
import { Question, QuestionDetail, QuestionRow, mapQuestionRow } from '../../types';
import { OtherDBError, requireUuid } from '../errors';

/**
 * Data-access contract for questions.
 * Rejects with InvalidUUIDError or OtherDBError.
 */
export interface QuestionsDao {
  createQuestion(question: Question): Promise<QuestionDetail>;
  getQuestions(): Promise<QuestionDetail[]>;
  deleteQuestion(questionUuid: string): Promise<void>;
}

export class PostgresQuestionsDao implements QuestionsDao {
  constructor(private readonly db: Queryable) {}

  async createQuestion(question: Question): Promise<QuestionDetail> {
    const query = `
      INSERT INTO questions (title, description)
      VALUES ($1, $2)
      RETURNING *
    `;
    try {
      const result = await this.db.query<QuestionRow>(query, [question.title, question.description]);
      return mapQuestionRow(result.rows[0]);
    } catch (error) {
      throw new OtherDBError(error);
    }
  }

  async getQuestions(): Promise<QuestionDetail[]> {
    try {
      const result = await this.db.query<QuestionRow>('SELECT * FROM questions');
      return result.rows.map(mapQuestionRow);
    } catch (error) {
      throw new OtherDBError(error);
    }
  }

  /** Deleting an id that matches no row still succeeds. */
  async deleteQuestion(questionUuid: string): Promise<void> {
    const uuid = requireUuid(questionUuid);
    try {
      await this.db.query('DELETE FROM questions WHERE question_uuid = $1', [uuid]);
    } catch (error) {
      throw new OtherDBError(error);
    }
  }
}
