const TOKEN_PATTERN = /token=[^&\s'"<>]+/g;

export const REDACTED_TOKEN = 'token=<redacted>';

/** Replace every `token=<value>` with `token=<redacted>`. */
export function redactTokens(value: string): string {
  return value.replace(TOKEN_PATTERN, REDACTED_TOKEN);
}
