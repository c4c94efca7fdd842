import { describe, it, expect } from 'vitest';
import {
  classifyError,
  formatRunError,
  formatStepError,
  toRunError,
} from '../../src/exception/classifier.js';
import {
  ConfigError,
  ExtractionError,
  IOError,
  NavigationError,
  SelectorError,
} from '../../src/exception/errors.js';

describe('typed errors', () => {
  it('carry their kind', () => {
    expect(new ConfigError('bad').kind).toBe('ConfigError');
    expect(new NavigationError('http://x/').kind).toBe('NavigationError');
    expect(new SelectorError('a.next').kind).toBe('SelectorError');
    expect(new ExtractionError('empty').kind).toBe('ExtractionError');
    expect(new IOError('/tmp/out.json').kind).toBe('IOError');
  });

  it('build readable messages', () => {
    expect(new ConfigError('workflow w.yaml is invalid', ['flow: Required', 'start: Required']).message).toBe(
      'workflow w.yaml is invalid: flow: Required; start: Required',
    );
    expect(new NavigationError('http://x/', new Error('timeout')).message).toBe('navigation to http://x/ failed: timeout');
    expect(new SelectorError('a.next').message).toBe('no element matches selector "a.next"');
    expect(new IOError('/tmp/out.json', 'EACCES').message).toBe('failed to write /tmp/out.json: EACCES');
  });

  it('name themselves after their class', () => {
    expect(new SelectorError('x').name).toBe('SelectorError');
    expect(new SelectorError('x').toRunError()).toEqual({
      kind: 'SelectorError',
      message: 'no element matches selector "x"',
    });
  });
});

describe('classifyError', () => {
  it('trusts the kind of typed errors', () => {
    expect(classifyError(new ExtractionError('navigation looked fine'))).toBe('ExtractionError');
  });

  describe('NavigationError', () => {
    it('classifies network failures', () => {
      expect(classifyError(new Error('net::ERR_NAME_NOT_RESOLVED at http://nowhere/'))).toBe('NavigationError');
    });

    it('classifies timeouts while loading a url', () => {
      expect(classifyError(new Error('Timeout 30000ms exceeded'), { url: 'http://x/' })).toBe('NavigationError');
    });
  });

  describe('SelectorError', () => {
    it('classifies timeouts waiting for a selector', () => {
      const error = new Error('Timeout 30000ms exceeded waiting for selector "#submit"');
      expect(classifyError(error, { selector: '#submit' })).toBe('SelectorError');
    });

    it('classifies malformed selectors', () => {
      expect(classifyError(new Error("'li[' is not a valid selector"))).toBe('SelectorError');
    });

    it('classifies strict mode violations', () => {
      expect(classifyError(new Error('strict mode violation: locator resolved to 3 elements'))).toBe('SelectorError');
    });
  });

  describe('IOError', () => {
    it('classifies file system error codes', () => {
      const error = Object.assign(new Error('EACCES: permission denied, open /out.json'), { code: 'EACCES' });
      expect(classifyError(error)).toBe('IOError');
    });
  });

  it('falls back to ExtractionError', () => {
    expect(classifyError(new Error('something odd'))).toBe('ExtractionError');
    expect(classifyError('plain string')).toBe('ExtractionError');
  });
});

describe('formatting', () => {
  it('renders a run error with its kind', () => {
    expect(formatRunError({ kind: 'ConfigError', message: 'bad' })).toBe('[ConfigError] bad');
  });

  it('renders a step error', () => {
    expect(formatStepError('detail', toRunError(new SelectorError('a.more')))).toBe(
      'step "detail" failed: [SelectorError] no element matches selector "a.more"',
    );
  });

  it('keeps the original message of untyped errors', () => {
    expect(toRunError(new Error('net::ERR_FAILED'))).toEqual({ kind: 'NavigationError', message: 'net::ERR_FAILED' });
  });
});
