import { Marked } from 'marked';
import TerminalRenderer from 'marked-terminal';

const terminalMarked = new Marked().setOptions({ renderer: new TerminalRenderer() });

/** Markdown to ANSI text for the terminal. */
export function renderMarkdown(text: string): string {
  const output = terminalMarked.parse(text);
  // async is never enabled here; the renderer leaves trailing newlines
  return typeof output === 'string' ? output.trimEnd() : text;
}
