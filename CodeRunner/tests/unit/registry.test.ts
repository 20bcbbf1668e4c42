import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { ConfigurationError } from '@snippet-sandbox/shared/Types/errors.js';
import { LanguageRegistry, renderCommand, resolveEntryName } from '../../src/languages/registry.js';

const LANGUAGES_FILE = fileURLToPath(new URL('../../config/languages.json', import.meta.url));

describe('LanguageRegistry', () => {
  describe('bundled table', () => {
    const registry = LanguageRegistry.fromFile(LANGUAGES_FILE);

    it('should register the bundled languages', () => {
      expect(registry.ids()).toEqual(['python', 'java', 'javascript', 'bash', 'c', 'cpp']);
    });

    it('should resolve ids and aliases case-insensitively', () => {
      expect(registry.resolve('python')?.id).toBe('python');
      expect(registry.resolve('PY')?.id).toBe('python');
      expect(registry.resolve(' c++ ')?.id).toBe('cpp');
      expect(registry.resolve('Node')?.id).toBe('javascript');
    });

    it('should return undefined for unknown languages', () => {
      expect(registry.resolve('cobol')).toBeUndefined();
      expect(registry.resolve('')).toBeUndefined();
    });

    it('should give Java a compile step and Python none', () => {
      expect(registry.resolve('java')?.compileCommand).toEqual([
        'javac', '-encoding', 'UTF-8', '-d', '{dir}', '{file}',
      ]);
      expect(registry.resolve('python')?.compileCommand).toBeUndefined();
    });

    it('should freeze profiles', () => {
      const profile = registry.resolve('python');
      expect(profile && Object.isFrozen(profile)).toBe(true);
      expect(profile && Object.isFrozen(profile.runCommand)).toBe(true);
    });
  });

  describe('fromTable', () => {
    it('should apply defaults for optional fields', () => {
      const registry = LanguageRegistry.fromTable({
        Ruby: { fileExtension: '.rb', runCommand: ['ruby', '{file}'] },
      });
      const profile = registry.resolve('ruby');

      expect(profile?.id).toBe('ruby');
      expect(profile?.aliases).toEqual([]);
      expect(profile?.entryName).toEqual({ pattern: undefined, fallback: 'main' });
      expect(profile?.memoryLimit).toBe(true);
    });

    it('should reject an alias claimed by two languages', () => {
      expect(() => LanguageRegistry.fromTable({
        python: { fileExtension: '.py', aliases: ['py'], runCommand: ['python3', '{file}'] },
        pypy: { fileExtension: '.py', aliases: ['PY'], runCommand: ['pypy3', '{file}'] },
      })).toThrow('Language key "PY" is claimed by both "python" and "pypy"');
    });

    it('should reject an empty run command', () => {
      expect(() => LanguageRegistry.fromTable({
        python: { fileExtension: '.py', runCommand: [] },
      })).toThrow(ConfigurationError);
    });

    it('should reject an empty table', () => {
      expect(() => LanguageRegistry.fromTable({})).toThrow('Language table is empty');
    });

    it('should reject an entry-name pattern that does not compile', () => {
      expect(() => LanguageRegistry.fromTable({
        java: {
          fileExtension: '.java',
          entryName: { pattern: '(', fallback: 'Main' },
          runCommand: ['java', '{name}'],
        },
      })).toThrow('Invalid entryName pattern for "java"');
    });

    it('should report an unreadable file as a configuration error', () => {
      expect(() => LanguageRegistry.fromFile('/nonexistent/languages.json')).toThrow(ConfigurationError);
    });
  });
});

describe('resolveEntryName', () => {
  const registry = LanguageRegistry.fromFile(LANGUAGES_FILE);
  const java = registry.resolve('java');
  const python = registry.resolve('python');

  it('should name Java sources after their public class', () => {
    expect(java && resolveEntryName(java, 'public class Hello {\n  public static void main(String[] a) {}\n}')).toBe('Hello');
  });

  it('should fall back when no public class is declared', () => {
    expect(java && resolveEntryName(java, 'class Helper {}')).toBe('Main');
  });

  it('should use the default stem for languages without a pattern', () => {
    expect(python && resolveEntryName(python, 'public class Hello {}')).toBe('main');
  });
});

describe('renderCommand', () => {
  it('should substitute placeholders inside each argument', () => {
    const ctx = { file: '/tmp/run-1/Main.java', dir: '/tmp/run-1', name: 'Main' };

    expect(renderCommand(['javac', '-d', '{dir}', '{file}'], ctx)).toEqual([
      'javac', '-d', '/tmp/run-1', '/tmp/run-1/Main.java',
    ]);
    expect(renderCommand(['{dir}/{name}'], ctx)).toEqual(['/tmp/run-1/Main']);
  });

  it('should leave unknown placeholders alone', () => {
    expect(renderCommand(['echo', '{other}'], { file: 'f', dir: 'd', name: 'n' })).toEqual(['echo', '{other}']);
  });
});
