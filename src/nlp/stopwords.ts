import lists from './stopwords.json' with { type: 'json' };

/**
 * Question words and relation nouns dropped when mining a research question for search terms.
 * Relation nouns ("effect", "impact", ...) describe the question, not its subject.
 */
export const QUESTION_STOPWORDS: ReadonlySet<string> = new Set(lists.question);

/**
 * Function words ignored when comparing a record title with a file name.
 */
export const TITLE_STOPWORDS: ReadonlySet<string> = new Set(lists.title);
