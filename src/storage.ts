import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { createLogger } from './logger.js';
import type { Article, ScrapeResult } from './types.js';

const log = createLogger('Output');

export type OutputFormat = 'json' | 'csv';

export function isOutputFormat(value: string): value is OutputFormat {
	return value === 'json' || value === 'csv';
}

export interface ResultEnvelope {
	siteName: string;
	totalRequested: number;
	totalFound: number;
	totalValid: number;
	successRate: number;
	durationSeconds: number;
	scrapedAt: string;
	articles: Article[];
}

export function toJsonArray(articles: readonly Article[]): string {
	return JSON.stringify(articles, null, 2);
}

// Percentage of found candidates that produced a valid article, two decimals.
export function successRate(found: number, valid: number): number {
	if (found === 0) return 0;
	return Math.round((valid / found) * 10_000) / 100;
}

export function toEnvelope(result: ScrapeResult): ResultEnvelope {
	const { stats } = result;
	return {
		siteName: stats.siteName,
		totalRequested: stats.requested,
		totalFound: stats.found,
		totalValid: stats.validated,
		successRate: successRate(stats.found, stats.validated),
		durationSeconds: Math.round(stats.durationSeconds * 100) / 100,
		scrapedAt: stats.finishedAt,
		articles: result.articles,
	};
}

export function toJsonEnvelope(result: ScrapeResult): string {
	return JSON.stringify(toEnvelope(result), null, 2);
}

export const CSV_HEADER = ['title', 'content', 'author', 'date', 'url', 'imageUrl', 'siteName', 'scrapedAt'];

// RFC 4180 quoting; embedded newlines become spaces so one article is one line.
export function csvField(value: string | null): string {
	const flat = (value ?? '').replace(/\r?\n|\r/g, ' ');
	return /[",]/.test(flat) ? `"${flat.replace(/"/g, '""')}"` : flat;
}

export function toCsvRows(articles: readonly Article[]): string[] {
	return articles.map((article) =>
		[
			article.title,
			article.content,
			article.author,
			article.publishedAt,
			article.url,
			article.imageUrl,
			article.siteName,
			article.scrapedAt,
		]
			.map(csvField)
			.join(','),
	);
}

export function toCsv(articles: readonly Article[]): string {
	return [CSV_HEADER.join(','), ...toCsvRows(articles)].join('\n') + '\n';
}

function datePrefix(date: Date): string {
	return date.toISOString().slice(0, 10);
}

export function outputPath(outputDir: string, siteId: string, format: OutputFormat, date = new Date()): string {
	return join(outputDir, format, `${datePrefix(date)}_${siteId}.${format}`);
}

export interface SaveOptions {
	// JSON only: false writes the bare article array.
	envelope?: boolean;
	date?: Date;
}

function render(result: ScrapeResult, format: OutputFormat, envelope: boolean): string {
	if (format === 'csv') return toCsv(result.articles);
	return envelope ? toJsonEnvelope(result) : toJsonArray(result.articles);
}

/**
 * Writes `<outputDir>/<format>/<YYYY-MM-DD>_<siteId>.<ext>` and returns the path.
 * A second run on the same day overwrites the file.
 */
export async function saveResult(
	result: ScrapeResult,
	format: OutputFormat,
	outputDir: string,
	{ envelope = true, date = new Date() }: SaveOptions = {},
): Promise<string> {
	const filepath = outputPath(outputDir, result.site.id, format, date);
	await mkdir(join(outputDir, format), { recursive: true });

	const body = render(result, format, envelope);
	await writeFile(filepath, body, 'utf-8');
	log.info(`Results saved to ${filepath}`);

	return filepath;
}
