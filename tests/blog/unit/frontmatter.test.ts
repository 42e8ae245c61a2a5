import { describe, it, expect } from 'vitest';

import {
  createFrontmatterGenerator,
  parseFrontmatter,
  type FrontmatterInput,
} from '../../../src/ai/blog/frontmatter';
import { BlogGenerationError } from '../../../src/ai/blog/types';

const input: FrontmatterInput = {
  title: 'Intro to Testing',
  date: new Date('2024-03-05T10:20:30.000Z'),
  description: 'Start testing today.',
  tags: ['testing', 'qa'],
  categories: ['Engineering'],
  author: 'Test Author',
  slug: 'intro-to-testing',
};

describe('createFrontmatterGenerator', () => {
  it('rejects unknown formats with CONFIG_ERROR', () => {
    expect(() => createFrontmatterGenerator('xml')).toThrow(BlogGenerationError);
    expect(() => createFrontmatterGenerator('xml')).toThrow(
      'Unsupported frontmatter format: "xml" (expected one of yaml, toml, json)'
    );
  });

  it('accepts formats case-insensitively', () => {
    expect(createFrontmatterGenerator(' YAML ').format).toBe('yaml');
  });

  describe('yaml', () => {
    const generator = createFrontmatterGenerator('yaml');

    it('wraps the block in --- lines', () => {
      const block = generator.generate(input);

      expect(block.startsWith('---\n')).toBe(true);
      expect(block.endsWith('\n---\n')).toBe(true);
      expect(block).toContain('title: Intro to Testing\n');
      expect(block).toContain('draft: false\n');
      expect(block).toContain('toc: true\n');
    });

    it('round-trips the fields', () => {
      const { fields, body, format } = parseFrontmatter(`${generator.generate(input)}\n# Body\n`);

      expect(format).toBe('yaml');
      expect(body).toBe('# Body');
      expect(fields).toEqual({
        title: 'Intro to Testing',
        date: '2024-03-05T10:20:30.000Z',
        draft: false,
        description: 'Start testing today.',
        tags: ['testing', 'qa'],
        categories: ['Engineering'],
        author: 'Test Author',
        slug: 'intro-to-testing',
        toc: true,
      });
    });

    it('flattens multi-line strings', () => {
      const block = generator.generate({ ...input, description: 'line one\nline two' });

      expect(parseFrontmatter(block).fields.description).toBe('line one line two');
    });
  });

  describe('toml', () => {
    const generator = createFrontmatterGenerator('toml');

    it('wraps the block in +++ lines and round-trips', () => {
      const block = generator.generate(input);

      expect(block.startsWith('+++\n')).toBe(true);
      expect(block.endsWith('\n+++\n')).toBe(true);
      expect(block).toContain('title = "Intro to Testing"');

      const parsed = parseFrontmatter(block);
      expect(parsed.format).toBe('toml');
      expect(parsed.fields).toMatchObject({
        title: 'Intro to Testing',
        date: '2024-03-05T10:20:30.000Z',
        tags: ['testing', 'qa'],
        draft: false,
      });
    });
  });

  describe('json', () => {
    const generator = createFrontmatterGenerator('json');

    it('writes a pretty-printed object', () => {
      const block = generator.generate({ title: 'T', date: '2024-01-01T00:00:00.000Z', toc: false });

      expect(block).toBe('{\n  "title": "T",\n  "date": "2024-01-01T00:00:00.000Z",\n  "draft": false\n}\n');
    });

    it('round-trips the fields', () => {
      const { fields, body, format } = parseFrontmatter(`${generator.generate({ ...input, draft: true })}\n# Body\n`);

      expect(format).toBe('json');
      expect(body).toBe('# Body');
      expect(fields).toEqual({
        title: 'Intro to Testing',
        date: '2024-03-05T10:20:30.000Z',
        draft: true,
        description: 'Start testing today.',
        tags: ['testing', 'qa'],
        categories: ['Engineering'],
        author: 'Test Author',
        slug: 'intro-to-testing',
        toc: true,
      });
    });

    it('parses a JSON object followed by a body with braces', () => {
      const parsed = parseFrontmatter('{"title": "a {b}"}\n\nBody {x}');

      expect(parsed).toEqual({ fields: { title: 'a {b}' }, body: 'Body {x}', format: 'json' });
    });
  });

  it('omits empty optional fields', () => {
    const block = createFrontmatterGenerator('json').generate({
      title: 'T',
      date: '2024-01-01T00:00:00.000Z',
      tags: [],
      author: '',
    });

    expect(JSON.parse(block)).toEqual({ title: 'T', date: '2024-01-01T00:00:00.000Z', draft: false, toc: true });
  });

  it('adds default fields without overriding explicit ones', () => {
    const generator = createFrontmatterGenerator('json', { author: 'Default', series: 'Basics' });

    const fields: unknown = JSON.parse(generator.generate({ ...input, date: '2024-01-01T00:00:00.000Z' }));

    expect(fields).toMatchObject({ author: 'Test Author', series: 'Basics' });
  });

  it('applies extra fields and lastmod last', () => {
    const generator = createFrontmatterGenerator('json');

    const fields: unknown = JSON.parse(
      generator.generate({
        title: 'T',
        date: '2024-01-01T00:00:00.000Z',
        extra: { draft: true, weight: 3 },
        lastmod: new Date('2024-02-01T00:00:00.000Z'),
      })
    );

    expect(fields).toEqual({
      title: 'T',
      date: '2024-01-01T00:00:00.000Z',
      draft: true,
      toc: true,
      weight: 3,
      lastmod: '2024-02-01T00:00:00.000Z',
    });
  });

  it('updates fields in existing content and keeps the body', () => {
    const generator = createFrontmatterGenerator('json');

    const updated = generator.update('---\ntitle: Old\nkeep: yes\n---\n\nBody text', { title: 'New' });

    expect(updated).toBe('{\n  "title": "New",\n  "keep": "yes"\n}\n\nBody text\n');
  });
});

describe('parseFrontmatter', () => {
  it('returns the whole text as body without frontmatter', () => {
    expect(parseFrontmatter('# Just a post\n')).toEqual({ fields: {}, body: '# Just a post' });
  });

  it('treats an unterminated block as body', () => {
    expect(parseFrontmatter('---\ntitle: x\n\nno end').format).toBeUndefined();
  });

  it('treats invalid yaml as body', () => {
    const parsed = parseFrontmatter('---\ntags: [unclosed\n---\nBody');

    expect(parsed.format).toBeUndefined();
  });

  it('accepts an empty yaml block', () => {
    expect(parseFrontmatter('---\n---\nBody')).toEqual({ fields: {}, body: 'Body', format: 'yaml' });
  });
});
