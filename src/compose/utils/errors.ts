const escapeRegex = (value: string): string => value.replace(/[-/\\^$*+?.()|[\]{}]/g, '\\$&');

const isScalarValue = (value: unknown): value is string | number | boolean => {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
};

/**
 * Locates each error in the source by matching its dotted path as nested keys. When the error
 * carries a scalar value the match extends to that value, otherwise it ends at the last key.
 */
const addRowNumbers = (contents: string, errors: ValidationError[]): void => {
  for (const error of errors) {
    if (!error.path) {
      continue;
    }
    let pattern = error.path.split('.')
      .map((key) => `(?:^|[\\s{,'"])${escapeRegex(key)}['"]?\\s*:`)
      .join('[\\s\\S]*?');
    if (!error.invalid_key && isScalarValue(error.value)) {
      pattern += `[^\\n]*?${escapeRegex(`${error.value}`.split('\n')[0])}`;
    }

    const match = new RegExp(pattern).exec(contents);
    if (match) {
      error.row = contents.substring(0, match.index + match[0].length).split('\n').length;
    }
  }
};

export class ComposeError extends Error { }

export interface ComposeFile {
  path: string;
  contents: string;
}

export class ValidationError {
  path: string;
  message: string;
  value?: unknown;
  /** 1-based line of the offending key or value, set when the source is known */
  row?: number;
  invalid_key: boolean;

  constructor(data: { path: string; message: string; value?: unknown, invalid_key?: boolean }) {
    this.path = data.path;
    this.message = data.message;
    this.value = data.value;
    this.invalid_key = data.invalid_key || false;
  }
}

export class ValidationErrors extends ComposeError {
  readonly errors: ValidationError[];
  file?: ComposeFile;

  constructor(errors: ValidationError[], file?: ComposeFile) {
    super();

    this.name = `ValidationErrors`;
    if (file) {
      addRowNumbers(file.contents, errors);
      const first_row = errors.length ? Math.min(...errors.map((error) => error.row || 1)) : 1;
      this.name += `\nfile: ${file.path}:${first_row}`;
    }

    this.message = JSON.stringify(errors, null, 2);
    this.errors = errors;
    this.file = file;
  }
}
