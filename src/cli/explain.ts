export const explanation = `
How normalize-filename works:

1. Every path on the command line is visited in order; with --recursive, directory
   contents are visited sorted by name, deepest entries first.
2. Names matching an exclusion glob (.DS_Store, .git, --exclude ...) are left alone.
3. The extension is split off and the rest of the name is scanned for a date:
   year-month[-day], day-month-year or month-name year, optionally followed by a time.
4. A date that is found is moved to the front as YYYY-MM[-DD][THH[-MM[-SS]]].
5. Without a date, the file's earliest timestamp (or --date-source) becomes the prefix.
6. The extension is lowercased, unless the entry is a directory.
7. The file is renamed (never over an existing file) and the inverse mv is appended
   to the undo log, which can be replayed bottom-up to revert.
`;
