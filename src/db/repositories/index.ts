/**
 * Repository Exports
 */

export * from './questionRepository';
export * from './answerRepository';
