// Input is spliced between two probe lines; without a final newline the
// after-probe would land on the user's last line (inside a comment, say).
export function ensureTrailingNewline(input: string): string {
  return input.endsWith("\n") ? input : input + "\n";
}
