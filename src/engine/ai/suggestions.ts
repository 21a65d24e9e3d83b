/**
 * Phrase starters offered while the user types a natural-language request.
 */
export const PHRASE_STARTERS = [
  'create a file named',
  'create a folder named',
  'list all files',
  'show me the files',
  'delete the file',
  'copy the file',
  'move the file',
  'go to the directory',
  'show me system info',
  'find files named',
  'where am I',
  'clear the screen',
  'help me'
] as const;

export const MAX_SUGGESTIONS = 5;

/**
 * Starters that begin with or contain the partial input, case-insensitively,
 * in table order.
 *
 * @example
 * suggest('create') // ['create a file named', 'create a folder named']
 */
export function suggest(partial: string): string[] {
  const needle = partial.toLowerCase();
  return PHRASE_STARTERS
    .filter(starter => starter.toLowerCase().includes(needle))
    .slice(0, MAX_SUGGESTIONS);
}
