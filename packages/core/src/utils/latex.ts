/**
 * Escape LaTeX special characters in plain text.
 */
export function escapeLatex(text: string): string {
  return text.replace(/[\\{}&%$#_^~]/g, (char) => {
    switch (char) {
      case '\\':
        return '\\textbackslash{}';
      case '~':
        return '\\textasciitilde{}';
      case '^':
        return '\\textasciicircum{}';
      default:
        return `\\${char}`;
    }
  });
}

const SECTION_COMMANDS = [
  '\\section',
  '\\subsection',
  '\\subsubsection',
  '\\paragraph',
  '\\subparagraph',
];

/**
 * Get the LaTeX sectioning command for a relative heading level.
 *
 * @param level Relative level, 1 = top level. Levels past the last command clamp to it.
 */
export function getSectionCommand(level: number): string {
  const index = Math.max(0, Math.min(level - 1, SECTION_COMMANDS.length - 1));
  return SECTION_COMMANDS[index];
}
