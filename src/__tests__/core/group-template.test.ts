import { describe, it, expect } from 'vitest';
import { compileGroupTemplate } from '../../core/group-template.js';
import { GroupRenderError, TemplateSyntaxError } from '../../utils/errors.js';
import { at, makeBuild } from '../fixtures/builds.js';

describe('compileGroupTemplate', () => {
  const build = makeBuild({
    id: 'b-1',
    number: 42,
    branch: 'main',
    pipeline: { name: 'svc-a', slug: 'svc-a-slug' },
    startedAt: at('2024-03-04T10:02:00.000Z'),
  });

  describe('rendering', () => {
    it('should render the pipeline name', () => {
      expect(compileGroupTemplate('{{.Pipeline.Name}}').render(build)).toBe('svc-a');
    });

    it('should allow whitespace inside actions and literal text around them', () => {
      const template = compileGroupTemplate('{{ .Pipeline.Slug }}/{{.Branch}}');
      expect(template.render(build)).toBe('svc-a-slug/main');
    });

    it('should render numbers and dates', () => {
      expect(compileGroupTemplate('#{{.Number}}').render(build)).toBe('#42');
      expect(compileGroupTemplate('{{.StartedAt}}').render(build)).toBe('2024-03-04T10:02:00.000Z');
    });

    it('should render plain text as-is', () => {
      expect(compileGroupTemplate('all builds').render(build)).toBe('all builds');
      expect(compileGroupTemplate('').render(build)).toBe('');
    });

    it('should return the same key on repeated calls', () => {
      const template = compileGroupTemplate('{{.Pipeline.Name}}-{{.Branch}}');
      expect(template.render(build)).toBe(template.render(build));
    });

    it('should keep the source', () => {
      expect(compileGroupTemplate('{{.Branch}}').source).toBe('{{.Branch}}');
    });
  });

  describe('compile errors', () => {
    it('should reject unknown fields', () => {
      expect(() => compileGroupTemplate('{{.Pipeline.Owner}}')).toThrow(TemplateSyntaxError);
      expect(() => compileGroupTemplate('{{.Pipeline.Owner}}')).toThrow('unknown field ".Pipeline.Owner"');
    });

    it('should reject inherited object properties', () => {
      expect(() => compileGroupTemplate('{{.constructor}}')).toThrow('unknown field ".constructor"');
    });

    it('should reject an unclosed action', () => {
      expect(() => compileGroupTemplate('x-{{.Branch')).toThrow('unclosed action starting at offset 2');
    });

    it('should reject functions and empty actions', () => {
      expect(() => compileGroupTemplate('{{printf "%s" .Branch}}')).toThrow('unsupported action');
      expect(() => compileGroupTemplate('{{}}')).toThrow('unsupported action');
    });
  });

  describe('render errors', () => {
    it('should raise GroupRenderError when a referenced value is not set', () => {
      const pending = makeBuild({ id: 'b-2', startedAt: undefined });
      const template = compileGroupTemplate('{{.StartedAt}}');

      let caught: unknown;
      try {
        template.render(pending);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(GroupRenderError);
      expect(caught).toMatchObject({
        buildId: 'b-2',
        path: 'StartedAt',
        message: '[build b-2] cannot render {{.StartedAt}}: value is not set',
      });
    });
  });
});
