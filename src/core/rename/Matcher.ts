import picomatch from 'picomatch';

export const DEFAULT_EXCLUDES = ['.DS_Store', 'Thumbs.db', 'desktop.ini', '.git', '.svn', '.hg'] as const;

/**
 * Decides which basenames the walk leaves alone. Patterns are globs against the
 * basename only; dotfiles are matched like any other name.
 */
export class Matcher {
  private readonly excludeMatchers: ((s: string) => boolean)[];

  constructor(excludes: readonly string[] = [], withDefaults = true) {
    const globs = withDefaults ? [...DEFAULT_EXCLUDES, ...excludes] : [...excludes];
    this.excludeMatchers = Array.from(new Set(globs)).map((g) => picomatch(g, { dot: true, nocase: false }));
  }

  isExcluded(basename: string): boolean {
    if (!basename) return true;
    return this.excludeMatchers.some((m) => m(basename));
  }
}
