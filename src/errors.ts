/**
 * Error hierarchy
 *
 * Every failure raised by the registry, the resolver, the config loader or the
 * theme layer extends ThemewrightError, which carries:
 *   - a stable `code` for programmatic handling
 *   - structured `details` for logging
 *   - `toJSON()` for the CLI's `--json` output
 *
 * Library code never swallows these; the host decides whether to log and
 * continue or abort.
 */

export type ThemewrightErrorCode =
  | 'HOOK_INVALID_REGISTRATION'
  | 'HOOK_REGISTRY_FROZEN'
  | 'HOOK_CALLBACK_FAILED'
  | 'HOOK_TIMEOUT'
  | 'TEMPLATE_NOT_FOUND'
  | 'TEMPLATE_INVALID_DESCRIPTOR'
  | 'CONFIG_INVALID'
  | 'THEME_STATE';

export interface SerializedError {
  name: string;
  code: ThemewrightErrorCode;
  message: string;
  details: Record<string, unknown>;
  cause?: string;
}

export class ThemewrightError extends Error {
  readonly code: ThemewrightErrorCode;
  readonly details: Record<string, unknown>;

  constructor(
    code: ThemewrightErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }

  toJSON(): SerializedError {
    const json: SerializedError = {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
    if (this.cause !== undefined) {
      json.cause = this.cause instanceof Error ? this.cause.message : String(this.cause);
    }
    return json;
  }
}

// ── Hooks ─────────────────────────────────────────────────────────────────

/** Malformed hook name, callback, priority or arity at registration time. */
export class InvalidRegistrationError extends ThemewrightError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('HOOK_INVALID_REGISTRATION', message, details);
  }
}

export class RegistryFrozenError extends ThemewrightError {
  constructor(operation: string) {
    super('HOOK_REGISTRY_FROZEN', `Cannot ${operation}: hook registry is frozen`, { operation });
  }
}

/**
 * A registered callback threw (or timed out) during dispatch. The original
 * error is available as `cause`.
 */
export class CallbackFailureError extends ThemewrightError {
  readonly hookName: string;
  readonly registrationId: string;
  readonly priority: number;

  constructor(hookName: string, registrationId: string, priority: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      'HOOK_CALLBACK_FAILED',
      `Callback ${registrationId} on hook "${hookName}" (priority ${priority}) failed: ${reason}`,
      { hookName, registrationId, priority },
      { cause }
    );
    this.hookName = hookName;
    this.registrationId = registrationId;
    this.priority = priority;
  }
}

export class HookTimeoutError extends ThemewrightError {
  constructor(hookName: string, registrationId: string, timeoutMs: number) {
    super(
      'HOOK_TIMEOUT',
      `Callback ${registrationId} on hook "${hookName}" timed out after ${timeoutMs} ms`,
      { hookName, registrationId, timeoutMs }
    );
  }
}

// ── Templates ─────────────────────────────────────────────────────────────

export class TemplateNotFoundError extends ThemewrightError {
  readonly candidates: string[];
  readonly roots: string[];

  constructor(candidates: readonly string[], roots: readonly string[]) {
    super(
      'TEMPLATE_NOT_FOUND',
      `No template found for [${candidates.join(', ')}] in roots [${roots.join(', ')}]`,
      { candidates: [...candidates], roots: [...roots] }
    );
    this.candidates = [...candidates];
    this.roots = [...roots];
  }
}

/** A content descriptor field that cannot be used to build candidates. */
export class InvalidDescriptorError extends ThemewrightError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('TEMPLATE_INVALID_DESCRIPTOR', message, details);
  }
}

// ── Config / theme ────────────────────────────────────────────────────────

export class ConfigError extends ThemewrightError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('CONFIG_INVALID', message, details);
  }
}

export class ThemeStateError extends ThemewrightError {
  constructor(message: string) {
    super('THEME_STATE', message);
  }
}

// ── Type guards ───────────────────────────────────────────────────────────

export function isThemewrightError(error: unknown): error is ThemewrightError {
  return error instanceof ThemewrightError;
}

export function isCallbackFailure(error: unknown): error is CallbackFailureError {
  return error instanceof CallbackFailureError;
}

export function isTemplateNotFound(error: unknown): error is TemplateNotFoundError {
  return error instanceof TemplateNotFoundError;
}

export function isInvalidRegistration(error: unknown): error is InvalidRegistrationError {
  return error instanceof InvalidRegistrationError;
}
