export interface Question {
  id: number;
  questionText: string;
  /** ISO-8601 UTC timestamp */
  pubDate: string;
}

export interface Choice {
  id: number;
  questionId: number;
  choiceText: string;
  votes: number;
}

export interface QuestionWithChoices extends Question {
  choices: Choice[];
}

export interface PollsStoreFile {
  nextQuestionId: number;
  nextChoiceId: number;
  questions: Question[];
  choices: Choice[];
}

export type QuestionOrder = 'pubDate' | '-pubDate';

export interface QuestionFilter {
  /** Keep questions published at or before this instant */
  pubDateLte?: Date;
  /** Case-insensitive substring of the question text */
  search?: string;
  order: QuestionOrder;
  limit?: number;
}

export const QUESTION_TEXT_MAX_LENGTH = 200;
export const CHOICE_TEXT_MAX_LENGTH = 200;
