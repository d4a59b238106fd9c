/**
 * Answer Repository
 * Answers always belong to a question; every operation validates the identifier it is given
 */

import type { Queryable } from '../index';
import { Answer, AnswerDetail, AnswerRow, mapAnswerRow } from '../../types';
import {
  InvalidUUIDError,
  OtherDBError,
  getPostgresErrorCode,
  postgresErrorCodes,
  requireUuid,
} from '../errors';

/**
 * Data-access contract for answers.
 * Rejects with InvalidUUIDError or OtherDBError.
 */
export interface AnswersDao {
  createAnswer(answer: Answer): Promise<AnswerDetail>;
  deleteAnswer(answerUuid: string): Promise<void>;
  getAnswers(questionUuid: string): Promise<AnswerDetail[]>;
}

export class PostgresAnswersDao implements AnswersDao {
  constructor(private readonly db: Queryable) {}

  /**
   * Insert an answer. A foreign-key violation means the question does not
   * exist and is reported as InvalidUUIDError, not OtherDBError.
   */
  async createAnswer(answer: Answer): Promise<AnswerDetail> {
    const questionUuid = requireUuid(answer.question_uuid);
    const query = `
      INSERT INTO answers (question_uuid, content)
      VALUES ($1, $2)
      RETURNING *
    `;
    try {
      const result = await this.db.query<AnswerRow>(query, [questionUuid, answer.content]);
      return mapAnswerRow(result.rows[0]);
    } catch (error) {
      if (getPostgresErrorCode(error) === postgresErrorCodes.FOREIGN_KEY_VIOLATION) {
        throw new InvalidUUIDError('Question not found');
      }
      throw new OtherDBError(error);
    }
  }

  async deleteAnswer(answerUuid: string): Promise<void> {
    const uuid = requireUuid(answerUuid);
    try {
      await this.db.query('DELETE FROM answers WHERE answer_uuid = $1', [uuid]);
    } catch (error) {
      throw new OtherDBError(error);
    }
  }

  async getAnswers(questionUuid: string): Promise<AnswerDetail[]> {
    const uuid = requireUuid(questionUuid);
    try {
      const result = await this.db.query<AnswerRow>(
        'SELECT * FROM answers WHERE question_uuid = $1',
        [uuid]
      );
      return result.rows.map(mapAnswerRow);
    } catch (error) {
      throw new OtherDBError(error);
    }
  }
}
