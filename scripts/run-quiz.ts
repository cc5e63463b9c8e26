#!/usr/bin/env npx tsx
/**
 * Quiz runner
 *
 * Generates multiple-choice quizzes from deck JSON files, grades answered
 * quizzes and manages per-deck quiz history from the command line.
 *
 * Usage:
 *   npx tsx scripts/run-quiz.ts <command> [options]
 *
 * Environment (via .env):
 *   QUIZ_DECKS_DIR   Directory of deck JSON files (or --decks)
 *   QUIZ_DATA_DIR    Settings and history directory (or --data, default .quiz-data)
 *
 * Commands:
 *   decks                         List decks
 *   generate --deck <name>        Generate a quiz and print it as JSON
 *   score --session <file>        Grade a saved quiz (with --answers)
 *   clear-history --deck <name>   Forget which cards were asked
 */

import {readFileSync, writeFileSync} from 'node:fs';
import {FileStorageAdapter} from '../src/adapters/filesystem/FileStorageAdapter';
import {JsonDeckSource} from '../src/adapters/filesystem/JsonDeckSource';
import {isQuizError} from '../src/domain/quiz/errors';
import {renderResultsHtml} from '../src/domain/quiz/exportHtml';
import {QuizService} from '../src/domain/quiz/quizService';
import {createSeededRandom, defaultRandom} from '../src/domain/quiz/random';
import {parseExcludedTags} from '../src/domain/quiz/tagFilter';
import type {QuizConfig, QuizSession} from '../src/domain/quiz/types';
import type {IStorageAdapter} from '../src/ports/IStorageAdapter';
import {type QuizSettings, applyQuizConfig, loadSettings, saveSettings, settingsToQuizConfig} from '../src/settings';
import {getArg, getDataDir, getIntArg, getToggle, parseAnswers, requireDecksDir} from './lib/cli-helpers';

const HELP = `
Quiz Runner

Usage:
  npx tsx scripts/run-quiz.ts <command> [options]

Commands:
  decks                         List decks and their card counts
  generate --deck <name>        Generate a quiz (JSON on stdout, or --output)
  score --session <file>        Grade a quiz saved by "generate"
  clear-history --deck <name>   Forget which cards of a deck were asked

Common options:
  --decks <dir>        Deck JSON directory (default: $QUIZ_DECKS_DIR)
  --data <dir>         Settings/history directory (default: $QUIZ_DATA_DIR or .quiz-data)

Generate options (defaults come from the saved settings):
  --questions <n>      Number of questions
  --choices <n>        Choices per question
  --per-page <n>       Questions per page
  --reuse / --no-reuse         Allow repeated wrong answers for small decks
  --history / --no-history     Skip previously asked cards and record this quiz
  --exclude-tags <a,b>         Tags to leave out
  --seed <value>       Seed for a reproducible quiz
  --output <file>      Write the quiz to a file

Score options:
  --answers <list>     Chosen choice index per question, e.g. 0,2,-,1 (- = unanswered)
  --html <file>        Also export the results as HTML

  --help, -h           Show help
`;

async function generate(
	args: string[],
	service: QuizService,
	storage: IStorageAdapter,
	settings: QuizSettings,
): Promise<void> {
	const deckName = getArg(args, '--deck') ?? settings.defaultDeck;
	if (!deckName) {
		throw new Error('--deck is required (no default deck saved yet)');
	}

	const excludeTags = getArg(args, '--exclude-tags');
	const config: QuizConfig = {
		...settingsToQuizConfig(settings),
		questionCount: getIntArg(args, '--questions') ?? settings.numQuestions,
		choiceCount: getIntArg(args, '--choices') ?? settings.numChoices,
		questionsPerPage: getIntArg(args, '--per-page') ?? settings.questionsPerPage,
		allowAnswerReuse: getToggle(args, 'reuse') ?? settings.allowAnswerReuse,
		saveHistory: getToggle(args, 'history') ?? settings.saveHistory,
		excludedTags: excludeTags !== undefined ? parseExcludedTags(excludeTags) : settings.excludeTags,
	};

	const {session, warnings, historyReset} = await service.startQuiz(deckName, config);
	for (const warning of warnings) {
		console.error(`Warning: ${warning}`);
	}
	if (historyReset) {
		console.error('Every card had been asked; quiz history was reset.');
	}

	await saveSettings(storage, applyQuizConfig(settings, session.config, session.deckName));

	const json = JSON.stringify(session, null, 2);
	const outputPath = getArg(args, '--output');
	if (outputPath) {
		writeFileSync(outputPath, json, 'utf-8');
		console.error(`Quiz with ${session.questions.length} questions written to ${outputPath}`);
	} else {
		console.log(json);
	}
}

async function score(args: string[], service: QuizService): Promise<void> {
	const sessionPath = getArg(args, '--session');
	if (!sessionPath) {
		throw new Error('--session is required');
	}

	const session: QuizSession = JSON.parse(readFileSync(sessionPath, 'utf-8'));
	if (!Array.isArray(session.questions)) {
		throw new Error(`${sessionPath} is not a saved quiz`);
	}

	const answers = parseAnswers(getArg(args, '--answers') ?? '');
	const {result, historySaved, warnings} = await service.completeQuiz(session, answers);
	for (const warning of warnings) {
		console.error(`Warning: ${warning}`);
	}

	console.log(`Score: ${result.correct}/${result.total} (${result.percent}%)`);
	for (const item of result.items) {
		const mark = item.isCorrect ? '✓' : '✗';
		console.log(`  ${mark} Q${item.number}: ${item.chosenAnswer ?? '(unanswered)'} -> ${item.correctAnswer}`);
	}
	if (historySaved) {
		console.error(`Recorded ${result.total} cards in the quiz history of "${session.deckName}"`);
	}

	const htmlPath = getArg(args, '--html');
	if (htmlPath) {
		writeFileSync(htmlPath, renderResultsHtml(result), 'utf-8');
		console.error(`Results exported to ${htmlPath}`);
	}
}

async function main() {
	const args = process.argv.slice(2);
	const command = args[0];

	if (!command || args.includes('--help') || args.includes('-h')) {
		console.log(HELP);
		process.exit(0);
	}

	const storage = new FileStorageAdapter(getDataDir(args));
	const settings = await loadSettings(storage);
	const seed = getArg(args, '--seed');

	const service = new QuizService(
		{
			cards: new JsonDeckSource(requireDecksDir(args)),
			storage,
			random: seed !== undefined ? createSeededRandom(seed) : defaultRandom,
		},
		{resetHistoryWhenExhausted: settings.resetHistoryWhenExhausted},
	);

	switch (command) {
		case 'decks': {
			const decks = await service.listDecks();
			if (decks.length === 0) {
				console.log('No decks found');
			}
			for (const deck of decks) {
				console.log(`${deck.name} (${deck.cardCount} cards)`);
			}
			break;
		}
		case 'generate':
			await generate(args, service, storage, settings);
			break;
		case 'score':
			await score(args, service);
			break;
		case 'clear-history': {
			const deckName = getArg(args, '--deck');
			if (!deckName) {
				throw new Error('--deck is required');
			}
			await service.clearHistory(deckName);
			console.log(`Quiz history cleared for "${deckName}"`);
			break;
		}
		default:
			console.error(`Unknown command: ${command}`);
			console.log(HELP);
			process.exit(1);
	}
}

main().catch((err) => {
	if (isQuizError(err)) {
		console.error(`Error: ${err.message}`);
	} else {
		console.error('Error:', err instanceof Error ? err.message : err);
		if (err instanceof Error) console.error(err.stack);
	}
	process.exit(1);
});
