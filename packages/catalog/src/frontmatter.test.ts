import { describe, expect, it } from 'vitest';

import { ParseError } from './errors.js';
import { extractFrontmatter, normalizeTags, parseAgentMetadata, slugify } from './frontmatter.js';

function parseIssue(content: string): string {
  try {
    parseAgentMetadata(content, 'agents/broken.md');
  } catch (err) {
    if (err instanceof ParseError) return err.issue;
    throw err;
  }
  throw new Error('expected a ParseError');
}

describe('extractFrontmatter', () => {
  it('returns the text between the fences', () => {
    expect(extractFrontmatter('---\nname: a\ndescription: b\n---\n# Body\n')).toBe('name: a\ndescription: b');
  });

  it('accepts CRLF line endings, a BOM and a YAML document end marker', () => {
    expect(extractFrontmatter('\uFEFF---\r\nname: a\r\n...\r\nbody')).toBe('name: a');
  });

  it('returns null when the document does not open with a fence', () => {
    expect(extractFrontmatter('# Title\n---\nname: a\n---\n')).toBeNull();
  });

  it('returns null when the block is never closed', () => {
    expect(extractFrontmatter('---\nname: a\n')).toBeNull();
  });
});

describe('slugify', () => {
  it('lower-cases and collapses separators', () => {
    expect(slugify('React Architect!')).toBe('react-architect');
    expect(slugify('  Hello__World  ')).toBe('hello-world');
  });
});

describe('normalizeTags', () => {
  it('merges lists and comma-separated strings into one sorted set', () => {
    expect(normalizeTags('React, TypeScript', ['react', 'Node', 3], undefined)).toEqual([
      '3',
      'node',
      'react',
      'typescript',
    ]);
  });
});

describe('parseAgentMetadata', () => {
  it('applies defaults and normalizes fields', () => {
    const metadata = parseAgentMetadata(
      `---
name: React Architect
description: Designs React apps
category: Architecture
stackTags: [React, TypeScript]
tags: frontend
model: opus
---

# React Architect
`,
      'architecture/react.md'
    );

    expect(metadata).toEqual({
      id: 'react-architect',
      name: 'React Architect',
      description: 'Designs React apps',
      category: 'architecture',
      stackTags: ['frontend', 'react', 'typescript'],
      model: 'opus',
    });
  });

  it('prefers an explicit id and defaults the category', () => {
    const metadata = parseAgentMetadata(
      '---\nid: UI Lead\nname: Interface Lead\ndescription: Owns the UI\nstack-tags: vue\n---\n',
      'lead.md'
    );

    expect(metadata.id).toBe('ui-lead');
    expect(metadata.category).toBe('other');
    expect(metadata.stackTags).toEqual(['vue']);
    expect(metadata).not.toHaveProperty('model');
  });

  it('stores multi-word categories in slug form', () => {
    const metadata = parseAgentMetadata(
      '---\nname: Redux Expert\ndescription: Manages stores\ncategory: State Management\n---\n',
      'state/redux.md'
    );

    expect(metadata.category).toBe('state-management');
  });

  it('rejects categories that produce an empty slug', () => {
    expect(parseIssue('---\nname: a\ndescription: b\ncategory: "???"\n---\n')).toBe(
      'cannot derive a category from "???"'
    );
  });

  it('reports a missing metadata block', () => {
    expect(parseIssue('# Just a heading\n')).toBe('missing front-matter metadata block');
  });

  it('prefixes the error message with the file path', () => {
    expect(() => parseAgentMetadata('# Nope', 'agents/broken.md')).toThrow(
      'agents/broken.md: missing front-matter metadata block'
    );
  });

  it('reports every missing required field', () => {
    expect(parseIssue('---\ncategory: testing\n---\n')).toBe(
      'invalid metadata: name is required; description is required'
    );
  });

  it('rejects non-string and blank fields', () => {
    expect(parseIssue('---\nname: 42\ndescription: ok\n---\n')).toBe('invalid metadata: name must be a string');
    expect(parseIssue('---\nname: "  "\ndescription: ok\n---\n')).toBe('invalid metadata: name must not be empty');
  });

  it('rejects a block that is not a mapping', () => {
    expect(parseIssue('---\n- a\n- b\n---\n')).toBe('metadata block must be a YAML mapping');
    expect(parseIssue('---\n---\n')).toBe('metadata block must be a YAML mapping');
  });

  it('rejects malformed YAML', () => {
    expect(parseIssue('---\nname: [unclosed\ndescription: x\n---\n')).toMatch(/^invalid YAML in metadata block: /);
  });

  it('rejects names that produce an empty id', () => {
    expect(parseIssue('---\nname: "!!!"\ndescription: x\n---\n')).toBe('cannot derive an id from "!!!"');
  });
});
