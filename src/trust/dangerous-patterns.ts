/**
 * Lexical screen for shell syntax that does more than the literal command.
 *
 * This is a substring scan, not a parser: a marker inside quotes still
 * counts. A command that trips any marker always needs confirmation, and
 * no trust rule can change that.
 */

export type DangerousCategory =
  | "destructive"
  | "substitution"
  | "chaining"
  | "redirection"
  | "background";

export interface DangerousPatternMatch {
  /** The marker that was found. */
  marker: string;
  category: DangerousCategory;
  /** Offset of the first occurrence of the marker in the command. */
  index: number;
}

// Groups are checked in this order and the first hit wins, so a command
// like "rm -rf / && echo done" reports the destructive marker.
const MARKER_GROUPS: ReadonlyArray<{ category: DangerousCategory; markers: readonly string[] }> = [
  {
    category: "destructive",
    markers: [
      "rm -rf",
      "sudo rm",
      "mkfs",
      "dd if=",
      ":(){ :|:& };:",
      "> /dev/",
      "chmod 777",
      "chown root",
      "su -",
      "sudo su",
      "del /",
      "rmdir /s",
    ],
  },
  { category: "substitution", markers: ["$(", "`", "<(", ">("] },
  // A line break separates commands just like ";".
  { category: "chaining", markers: ["&&", "||", ";", "|", "\n", "\r"] },
  { category: "redirection", markers: [">>", ">", "<"] },
  { category: "background", markers: ["&"] },
];

const CATEGORY_LABELS: Record<DangerousCategory, string> = {
  destructive: "destructive command",
  substitution: "command or process substitution",
  chaining: "command chaining",
  redirection: "input/output redirection",
  background: "background execution",
};

export function findDangerousPattern(command: string): DangerousPatternMatch | null {
  for (const { category, markers } of MARKER_GROUPS) {
    for (const marker of markers) {
      const index = command.indexOf(marker);
      if (index !== -1) {
        return { marker, category, index };
      }
    }
  }
  return null;
}

export function isDangerous(command: string): boolean {
  return findDangerousPattern(command) !== null;
}

function printableMarker(marker: string): string {
  return marker.replace(/\n/g, "\\n").replace(/\r/g, "\\r");
}

export function describeDangerousMatch(match: DangerousPatternMatch): string {
  return `'${printableMarker(match.marker)}' (${CATEGORY_LABELS[match.category]})`;
}
