export function parseArgsString(str: string): string[] {
  const args: string[] = [];
  let current = "";
  let inQuote: "'" | '"' | null = null;
  let quoted = false;

  for (let i = 0; i < str.length; i++) {
    const char = str[i];
    if (inQuote) {
      if (char === inQuote) {
        inQuote = null;
      } else {
        current += char;
      }
    } else {
      if (char === '"' || char === "'") {
        inQuote = char;
        quoted = true;
      } else if (char === " " || char === "\t") {
        if (current.length > 0 || quoted) {
          args.push(current);
          current = "";
          quoted = false;
        }
      } else {
        current += char;
      }
    }
  }
  if (current.length > 0 || quoted) args.push(current);
  return args;
}

/**
 * Quotes one argument for the device shell, which receives `adb shell` args
 * joined by spaces.
 */
export function quoteShellArg(arg: string): string {
  if (/^[A-Za-z0-9_@%+=:,./-]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}
