import { InvalidAnswerError } from './errors';
import type { QuizAnswers, QuizResult, QuizResultItem, QuizSession } from './types';

/**
 * Grade a quiz session
 *
 * Answers are choice indexes aligned with `session.questions`; missing or
 * null entries count as wrong. Correctness is by index, so repeated
 * distractor texts can't be mistaken for the correct answer.
 *
 * @throws InvalidAnswerError when an index is outside a question's choices
 */
export function scoreQuizSession(session: QuizSession, answers: QuizAnswers): QuizResult {
  const items: QuizResultItem[] = session.questions.map((question, i) => {
    const chosen = answers[i] ?? null;

    if (chosen !== null && (!Number.isInteger(chosen) || chosen < 0 || chosen >= question.choices.length)) {
      throw new InvalidAnswerError(question.number, chosen);
    }

    return {
      number: question.number,
      cardId: question.cardId,
      prompt: question.prompt,
      chosenAnswer: chosen === null ? null : question.choices[chosen],
      correctAnswer: question.correctAnswer,
      isCorrect: chosen === question.correctIndex,
    };
  });

  const total = items.length;
  const correct = items.filter((item) => item.isCorrect).length;

  return {
    sessionId: session.id,
    deckName: session.deckName,
    total,
    correct,
    percent: Math.round((100 * correct) / Math.max(1, total)),
    items,
  };
}
