import { describe, it, expect } from 'vitest';
import {
  interpret,
  interpretByKeywords,
  fillTemplate,
  PASSTHROUGH_EXPLANATION,
  MULTI_STEP_EXPLANATION,
  KEYWORD_EXPLANATION
} from '../src/engine/ai/translator';
import { loadRuleTable, parseRuleTable } from '../src/engine/ai/rules';
import { suggest } from '../src/engine/ai/suggestions';

describe('interpret', () => {
  describe('multi-step rules', () => {
    it('should create a folder and move a file into it', () => {
      expect(interpret('create a folder called docs and move notes.txt into it')).toEqual({
        commandLine: 'mkdir docs && mv notes.txt docs/',
        explanation: MULTI_STEP_EXPLANATION,
        stage: 'multi-step',
        category: 'create_and_move'
      });
    });

    it('should copy files by extension', () => {
      expect(interpret('copy all .py files to backup').commandLine).toBe('cp *.py backup/');
    });

    it('should delete everything in a directory', () => {
      expect(interpret('delete all files in tmp').commandLine).toBe('rm tmp/*');
    });

    it('should find and delete by name', () => {
      expect(interpret('find and delete files named temp.log').commandLine).toBe('find . -name "temp.log" -delete');
    });
  });

  describe('category patterns', () => {
    it('should create a file', () => {
      expect(interpret('create a file named test.txt')).toEqual({
        commandLine: 'touch test.txt',
        explanation: "Interpreted 'create a file named test.txt' as 'touch test.txt'",
        stage: 'pattern',
        category: 'create_file'
      });
    });

    it('should match case-insensitively on the lower-cased phrase', () => {
      const outcome = interpret('  Create A File Named Test.TXT ');
      expect(outcome.commandLine).toBe('touch test.txt');
      expect(outcome.explanation).toBe("Interpreted '  Create A File Named Test.TXT ' as 'touch test.txt'");
    });

    it.each([
      ['list all files', 'ls', 'list_files'],
      ['show me system info', 'top', 'system_info'],
      ['where am i', 'pwd', 'current_directory'],
      ['delete the file old.txt', 'rm old.txt', 'delete_file'],
      ['copy notes.txt to backup', 'cp notes.txt backup', 'copy_file'],
      ['show memory usage', 'free', 'memory_usage'],
      ['list running processes', 'ps', 'list_processes'],
      ['clear the screen', 'clear', 'clear_screen']
    ])('should read %j as %j', (phrase, commandLine, category) => {
      const outcome = interpret(phrase);
      expect(outcome.commandLine).toBe(commandLine);
      expect(outcome.stage).toBe('pattern');
      expect(outcome.category).toBe(category);
    });
  });

  describe('keyword fallback', () => {
    it('should be used when no pattern matches', () => {
      expect(interpret('new folder')).toEqual({
        commandLine: 'mkdir newfolder',
        explanation: KEYWORD_EXPLANATION,
        stage: 'keyword'
      });
    });

    it('should apply the heuristics in order', () => {
      expect(interpretByKeywords('new file')).toBe('touch newfile.txt');
      expect(interpretByKeywords('new file report.md')).toBe('touch report.md');
      expect(interpretByKeywords('make folder assets')).toBe('mkdir assets');
      expect(interpretByKeywords('navigate up to docs')).toBe('cd docs');
      expect(interpretByKeywords('show contents')).toBe('ls');
      expect(interpretByKeywords('remove the file junk.txt')).toBe('rm junk.txt');
    });

    it('should give up when nothing applies', () => {
      expect(interpretByKeywords('delete')).toBeNull();
      expect(interpretByKeywords('go')).toBeNull();
      expect(interpretByKeywords('hello')).toBeNull();
    });
  });

  describe('passthrough', () => {
    it('should return the phrase unchanged', () => {
      expect(interpret('xyzzy')).toEqual({
        commandLine: 'xyzzy',
        explanation: PASSTHROUGH_EXPLANATION,
        stage: 'passthrough'
      });
    });

    it('should pass an empty phrase through', () => {
      expect(interpret('   ').stage).toBe('passthrough');
    });
  });
});

describe('fillTemplate', () => {
  it('should substitute groups by index, repeating as needed', () => {
    expect(fillTemplate('mkdir {0} && mv {1} {0}/', ['docs', 'a.txt'])).toBe('mkdir docs && mv a.txt docs/');
  });

  it('should use an empty string for missing groups', () => {
    expect(fillTemplate('cp {0} {1}', ['a', undefined])).toBe('cp a ');
  });
});

describe('rule table', () => {
  it('should load the bundled rules in priority order', () => {
    const rules = loadRuleTable();
    expect(rules.multiStep.map(rule => rule.name)).toEqual([
      'create_and_move',
      'copy_by_extension',
      'delete_all_in_dir',
      'find_and_delete'
    ]);
    expect(rules.categories[0].category).toBe('create_file');
    expect(rules.categories[rules.categories.length - 1].category).toBe('echo');
    expect(loadRuleTable()).toBe(rules);
  });

  it('should accept a custom table', () => {
    const rules = parseRuleTable(`
multiStep: []
categories:
  - category: greet
    patterns: ['hello (\\w+)']
    template: 'echo hi {0}'
`);
    expect(interpret('Hello World', rules)).toEqual({
      commandLine: 'echo hi world',
      explanation: "Interpreted 'Hello World' as 'echo hi world'",
      stage: 'pattern',
      category: 'greet'
    });
  });

  it('should reject malformed tables', () => {
    expect(() => parseRuleTable('categories: []')).toThrow('Invalid rule table format');
    expect(() => parseRuleTable('multiStep: [{ name: x }]\ncategories: []')).toThrow('Invalid rule table format');
    expect(() => parseRuleTable('multiStep: [\n')).toThrow('Invalid rule table YAML');
  });
});

describe('suggest', () => {
  it('should return starters that begin with the input', () => {
    expect(suggest('create')).toEqual(['create a file named', 'create a folder named']);
  });

  it('should return at most five substring matches in order', () => {
    expect(suggest('the')).toEqual([
      'show me the files',
      'delete the file',
      'copy the file',
      'move the file',
      'go to the directory'
    ]);
  });

  it('should ignore case', () => {
    expect(suggest('WHERE')).toEqual(['where am I']);
  });

  it('should return nothing for unknown input', () => {
    expect(suggest('xyz')).toEqual([]);
  });
});
