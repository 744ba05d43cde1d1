import { describe, it, expect } from 'vitest';
import {
  CHAIN_OF_THOUGHT_TEMPLATE,
  FAST_TEMPLATE,
  isModeName,
  renderTemplate,
  resolveMode,
} from '../src/rag/modes.js';
import { ConfigurationError } from '../src/errors.js';

describe('resolveMode', () => {
  it('builds the standard mode', () => {
    const mode = resolveMode('standard');
    expect(mode).toEqual({
      name: 'standard',
      model: 'gpt-4-turbo-preview',
      retrievalK: 4,
      template: CHAIN_OF_THOUGHT_TEMPLATE,
      temperature: 0,
      maxTokens: 1000,
    });
  });

  it('builds the fast mode', () => {
    const mode = resolveMode('fast');
    expect(mode.model).toBe('gpt-3.5-turbo');
    expect(mode.retrievalK).toBe(3);
    expect(mode.template).toBe(FAST_TEMPLATE);
  });

  it('returns a frozen mode', () => {
    const mode = resolveMode('fast');
    expect(Object.isFrozen(mode)).toBe(true);
    expect(() => {
      Object.assign(mode, { retrievalK: 10 });
    }).toThrow(TypeError);
  });

  it('applies overrides but keeps the template', () => {
    const mode = resolveMode('standard', { model: 'local-model', retrievalK: 6, maxTokens: 200 });
    expect(mode.model).toBe('local-model');
    expect(mode.retrievalK).toBe(6);
    expect(mode.maxTokens).toBe(200);
    expect(mode.template).toBe(CHAIN_OF_THOUGHT_TEMPLATE);
  });

  it('does not leak overrides into later resolutions', () => {
    resolveMode('fast', { retrievalK: 9 });
    expect(resolveMode('fast').retrievalK).toBe(3);
  });

  it('rejects unknown modes', () => {
    expect(() => resolveMode('turbo')).toThrow('Unknown mode "turbo". Valid: standard, fast');
  });

  it('rejects a blank model', () => {
    expect(() => resolveMode('fast', { model: '  ' })).toThrow(ConfigurationError);
  });

  it('rejects a non-positive k', () => {
    expect(() => resolveMode('fast', { retrievalK: 0 })).toThrow('retrievalK must be a positive integer, got 0');
  });

  it('rejects an out-of-range temperature', () => {
    expect(() => resolveMode('fast', { temperature: 3 })).toThrow(ConfigurationError);
  });

  it('rejects a fractional maxTokens', () => {
    expect(() => resolveMode('fast', { maxTokens: 1.5 })).toThrow(ConfigurationError);
  });
});

describe('isModeName', () => {
  it('recognizes mode names', () => {
    expect(isModeName('standard')).toBe(true);
    expect(isModeName('fast')).toBe(true);
    expect(isModeName('Fast')).toBe(false);
  });
});

describe('templates', () => {
  it('both templates carry both placeholders', () => {
    for (const template of [CHAIN_OF_THOUGHT_TEMPLATE, FAST_TEMPLATE]) {
      expect(template).toContain('{context}');
      expect(template).toContain('{question}');
    }
  });

  it('the standard template asks for step-by-step reasoning', () => {
    expect(CHAIN_OF_THOUGHT_TEMPLATE).toContain('Let me break this down step by step:');
  });
});

describe('renderTemplate', () => {
  it('substitutes both placeholders', () => {
    expect(renderTemplate('C: {context}\nQ: {question}', { context: 'docs', question: 'why?' })).toBe(
      'C: docs\nQ: why?'
    );
  });

  it('does not rescan substituted text', () => {
    expect(
      renderTemplate('C: {context} Q: {question}', { context: 'see {question}', question: 'what is {context}?' })
    ).toBe('C: see {question} Q: what is {context}?');
  });

  it('renders the fast template exactly', () => {
    expect(renderTemplate(FAST_TEMPLATE, { context: 'X', question: 'Y' })).toBe(
      'Answer this technical question using the context.\n\nContext: X\n\nQuestion: Y\n\nAnswer:'
    );
  });
});
