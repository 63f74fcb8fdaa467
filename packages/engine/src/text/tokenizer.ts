/**
 * Tokenizer shared by ingestion, keyword search, the lexical reranker and
 * highlight extraction. All of them must agree on terms, so this is the only
 * place that lowercases, splits, filters stop words and stems.
 */

import stopwordList from "./stopwords.json";

const STOP_WORDS: ReadonlySet<string> = new Set(stopwordList);

const WORD_PATTERN = /[\p{L}\p{N}]+/gu;

export interface TokenSpan {
	/** Normalized term (lowercased, stemmed) */
	term: string;
	/** Offset into the original text (inclusive) */
	start: number;
	/** Offset into the original text (exclusive) */
	end: number;
}

export function isStopWord(word: string): boolean {
	return STOP_WORDS.has(word);
}

/**
 * Light suffix stripping. Words of three characters or fewer are kept as-is.
 */
export function stem(word: string): string {
	if (word.length <= 3) return word;

	let w = word;
	if (w.endsWith("ies") && w.length > 4) {
		w = `${w.slice(0, -3)}y`;
	} else if (w.endsWith("sses")) {
		w = w.slice(0, -2);
	} else if (/(?:ch|sh|x|z)es$/.test(w)) {
		w = w.slice(0, -2);
	} else if (w.endsWith("s") && !/(?:ss|us|is)$/.test(w)) {
		w = w.slice(0, -1);
	}

	if (w.endsWith("ing") && w.length - 3 >= 3) {
		w = w.slice(0, -3);
	} else if (w.endsWith("ed") && w.length - 2 >= 3) {
		w = w.slice(0, -2);
	}

	return w;
}

/**
 * Every non-stop-word token with its position in `text`.
 */
export function tokenizeWithOffsets(text: string): TokenSpan[] {
	const spans: TokenSpan[] = [];
	for (const match of text.matchAll(WORD_PATTERN)) {
		const word = match[0].toLowerCase();
		if (isStopWord(word)) continue;
		const start = match.index ?? 0;
		spans.push({ term: stem(word), start, end: start + match[0].length });
	}
	return spans;
}

export function tokenize(text: string): string[] {
	return tokenizeWithOffsets(text).map((span) => span.term);
}

/** Distinct terms in first-seen order */
export function uniqueTerms(text: string): string[] {
	return [...new Set(tokenize(text))];
}
