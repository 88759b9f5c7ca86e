/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'runtime' | 'validation';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: SKIFF-{category}{3-digit} (e.g., SKIFF-R001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Lexer Errors (SKIFF-L0xx)
  {
    errorId: 'SKIFF-L001',
    category: 'lexer',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string literal',
    cause: 'String opened with a quote but never closed before end of line.',
    resolution: 'Add the matching closing quote.',
  },
  {
    errorId: 'SKIFF-L002',
    category: 'lexer',
    description: 'Unexpected character',
    messageTemplate: 'Unexpected character: {char}',
    cause: 'Character is not part of Skiff syntax.',
    resolution: 'Remove or replace the character.',
  },
  {
    errorId: 'SKIFF-L003',
    category: 'lexer',
    description: 'Invalid escape sequence',
    messageTemplate: 'Invalid escape sequence: \\{sequence}',
    cause: 'Backslash followed by an unsupported character in a string.',
    resolution: 'Use \\n, \\t, \\r, \\\\, \\" or \\\'.',
  },

  // Parse Errors (SKIFF-P0xx)
  {
    errorId: 'SKIFF-P001',
    category: 'parse',
    description: 'Unexpected token',
    messageTemplate: 'Unexpected token: {token}',
    cause: 'Token cannot start or continue an expression here.',
    resolution: 'Check for a missing operand, comma or bracket.',
  },
  {
    errorId: 'SKIFF-P002',
    category: 'parse',
    description: 'Expected token',
    messageTemplate: '{message}',
    cause: 'A required token such as a closing bracket is missing.',
    resolution: 'Insert the expected token.',
  },

  // Runtime Errors (SKIFF-R0xx)
  {
    errorId: 'SKIFF-R001',
    category: 'runtime',
    description: 'Missing element expression',
    messageTemplate: 'Missing element expression in {literal}',
    cause:
      'A sequence literal built outside the parser has an empty element slot.',
    resolution: 'Fill every element slot before evaluating the tree.',
  },
  {
    errorId: 'SKIFF-R002',
    category: 'runtime',
    description: 'Undefined variable',
    messageTemplate: 'Variable {name} is not defined',
    cause: 'Name read before any assignment or host binding.',
    resolution: 'Assign the variable first or pass it in RuntimeOptions.',
  },
  {
    errorId: 'SKIFF-R003',
    category: 'runtime',
    description: 'Undefined function',
    messageTemplate: 'Function {name} is not defined',
    cause: 'Called name is neither a builtin nor a host function.',
    resolution: 'Check the spelling or register the host function.',
  },
  {
    errorId: 'SKIFF-R004',
    category: 'runtime',
    description: 'Type mismatch',
    messageTemplate: '{message}',
    cause: 'Operation applied to a value of the wrong type.',
    resolution: 'Convert the value or use an operation that accepts it.',
  },
  {
    errorId: 'SKIFF-R005',
    category: 'runtime',
    description: 'Execution aborted',
    messageTemplate: 'Execution aborted',
    cause: 'The host aborted the AbortSignal passed in RuntimeOptions.',
    resolution: 'None needed; the host requested cancellation.',
  },
  {
    errorId: 'SKIFF-R006',
    category: 'runtime',
    description: 'Frozen value mutation',
    messageTemplate: 'Cannot mutate frozen {type}',
    cause: 'The list belongs to a context whose execution has finished.',
    resolution: 'Copy the value with list() before mutating it.',
  },
  {
    errorId: 'SKIFF-R007',
    category: 'runtime',
    description: 'Index out of range',
    messageTemplate: 'Index {index} out of range for {type} of length {length}',
    cause: 'Subscript outside [-length, length).',
    resolution: 'Check the length with len() before indexing.',
  },
  {
    errorId: 'SKIFF-R008',
    category: 'runtime',
    description: 'Function timeout',
    messageTemplate: 'Function {name} timed out after {timeoutMs}ms',
    cause: 'A host function exceeded RuntimeOptions.timeout.',
    resolution: 'Raise the timeout or make the host function faster.',
  },

  // Validation Errors (SKIFF-V0xx)
  {
    errorId: 'SKIFF-V001',
    category: 'validation',
    description: 'Undefined name',
    messageTemplate: 'Name {name} is not defined',
    cause: 'Identifier or call target unknown before execution.',
    resolution: 'Assign the name earlier in the script or bind it as a host value.',
  },
  {
    errorId: 'SKIFF-V002',
    category: 'validation',
    description: 'Reserved assignment target',
    messageTemplate: 'Cannot assign to builtin {name}',
    cause: 'Assignment target shadows a builtin function.',
    resolution: 'Choose a different variable name.',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Variable {name} is not defined", { name: "x" })
 * // Returns: "Variable x is not defined"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      let j = i + 1;
      while (j < template.length && template.charAt(j) !== '}') {
        j++;
      }

      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        result += String(value);
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
