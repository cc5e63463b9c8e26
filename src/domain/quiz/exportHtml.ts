import { stripHtml } from './answerText';
import type { QuizResult } from './types';

const CORRECT_ROW_COLOR = '#cfc';
const INCORRECT_ROW_COLOR = '#fcc';

function cellText(html: string | null): string {
  return stripHtml(html ?? '')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

/**
 * Render a graded quiz as a standalone HTML fragment: a heading, the score
 * and one table row per question
 */
export function renderResultsHtml(result: QuizResult): string {
  const header = '<tr><th>#</th><th>Prompt</th><th>Your Answer</th><th>Correct Answer</th></tr>';

  const rows = result.items.map((item) => {
    const color = item.isCorrect ? CORRECT_ROW_COLOR : INCORRECT_ROW_COLOR;
    return (
      `<tr style='background:${color}'>` +
      `<td>${item.number}</td>` +
      `<td>${cellText(item.prompt)}</td>` +
      `<td>${cellText(item.chosenAnswer)}</td>` +
      `<td>${cellText(item.correctAnswer)}</td>` +
      '</tr>'
    );
  });

  return [
    '<h2>Quiz Results</h2>',
    `<p>Score: ${result.correct}/${result.total} (${result.percent}%)</p>`,
    `<table border=1 cellpadding=4>${header}${rows.join('')}</table>`,
  ].join('');
}
