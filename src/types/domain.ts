/**
 * Domain types for questions and answers
 * Wire payloads keep the snake_case field names of the tables
 */

// ============================================================================
// QUESTION
// ============================================================================

/**
 * Input for creating a question
 */
export interface Question {
  title: string;
  description: string;
}

/**
 * Persisted question as returned to clients
 */
export interface QuestionDetail {
  question_uuid: string;
  title: string;
  description: string;
  created_at: string; // ISO-8601
}

export interface QuestionId {
  question_uuid: string;
}

// ============================================================================
// ANSWER
// ============================================================================

/**
 * Input for creating an answer to an existing question
 */
export interface Answer {
  question_uuid: string;
  content: string;
}

export interface AnswerDetail {
  answer_uuid: string;
  question_uuid: string;
  content: string;
  created_at: string; // ISO-8601
}

export interface AnswerId {
  answer_uuid: string;
}

// ============================================================================
// DATABASE ROW TYPES
// ============================================================================

/**
 * Raw database row from questions table
 */
export interface QuestionRow {
  question_uuid: string;
  title: string;
  description: string;
  created_at: Date;
}

/**
 * Raw database row from answers table
 */
export interface AnswerRow {
  answer_uuid: string;
  question_uuid: string;
  content: string;
  created_at: Date;
}

// ============================================================================
// MAPPER FUNCTIONS
// ============================================================================

export const mapQuestionRow = (row: QuestionRow): QuestionDetail => ({
  question_uuid: row.question_uuid,
  title: row.title,
  description: row.description,
  created_at: row.created_at.toISOString(),
});

export const mapAnswerRow = (row: AnswerRow): AnswerDetail => ({
  answer_uuid: row.answer_uuid,
  question_uuid: row.question_uuid,
  content: row.content,
  created_at: row.created_at.toISOString(),
});
