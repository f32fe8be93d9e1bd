/**
 * POSIX single-quote a word: everything is literal except `'`, which becomes `'\''`.
 */
export function shellQuote(word: string): string {
	if (word.length > 0 && /^[A-Za-z0-9_@%+=:,./-]+$/.test(word)) return word;
	return `'${word.replace(/'/g, `'\\''`)}'`;
}

/** Comments end at the newline; keep a hostile filename from starting a command. */
export function shellComment(text: string): string {
	return `# ${text.replace(/[\r\n]+/g, ' ')}`;
}
