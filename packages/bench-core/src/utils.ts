const SHELL_SAFE = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Quote a value for POSIX sh, leaving plain words untouched
 */
export function shellQuote(value: string): string {
  if (SHELL_SAFE.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, "'\\''")}'`;
}

/**
 * Substitute `{name}` placeholders in a command template.
 * Unknown placeholders are an error so a typo never reaches the shell.
 */
export function renderCommand(template: string, vars: Record<string, string>): string {
  return template.replace(/\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_match, name: string) => {
    const value = vars[name];
    if (value === undefined) {
      throw new Error(`Missing value for command placeholder {${name}} in: ${template}`);
    }
    return shellQuote(value);
  });
}

/**
 * Prefix a command with exports so the overrides apply to that command only
 */
export function withEnv(command: string, env: Record<string, string> = {}): string {
  const entries = Object.entries(env);
  if (entries.length === 0) {
    return command;
  }
  for (const [key] of entries) {
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(key)) {
      throw new Error(`Invalid environment variable name: ${key}`);
    }
  }
  const assignments = entries.map(([key, value]) => `${key}=${shellQuote(value)}`).join(' ');
  return `export ${assignments} && ${command}`;
}

/**
 * Format milliseconds to human-readable string
 */
export function formatMs(ms: number): string {
  if (ms < 1) {
    return `${(ms * 1000).toFixed(2)}µs`;
  }
  if (ms < 1000) {
    return `${ms.toFixed(2)}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
