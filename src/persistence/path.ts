import * as os from "node:os";
import * as path from "node:path";

const HOME_SHORTHAND = "~";

/**
 * 先頭の `~` をホームディレクトリに展開する。
 * ホームディレクトリが取得できない場合は入力をそのまま返す。
 */
export function resolvePath(
  input: string,
  homeDir: () => string = os.homedir,
): string {
  if (!input.startsWith(HOME_SHORTHAND)) return input;

  let home: string;
  try {
    home = homeDir();
  } catch {
    return input;
  }
  if (!home) return input;

  const remainder = input.slice(HOME_SHORTHAND.length).replace(/^[/\\]+/, "");
  if (remainder === "") return home;
  return path.join(home, remainder);
}
