// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { logger, LogLevel, parseLogLevel } from '../src/logger.js';

describe('Logger', () => {
  const originalChalkLevel = chalk.level;

  beforeEach(() => {
    // Reset logger to NORMAL level before each test
    logger.setLevel(LogLevel.NORMAL);
    chalk.level = 0;
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    chalk.level = originalChalkLevel;
    vi.restoreAllMocks();
  });

  describe('parseLogLevel', () => {
    it('returns NORMAL when no flags set', () => {
      expect(parseLogLevel({})).toBe(LogLevel.NORMAL);
    });

    it('returns VERBOSE when verbose flag set', () => {
      expect(parseLogLevel({ verbose: true })).toBe(LogLevel.VERBOSE);
    });

    it('returns DEBUG when debug flag set', () => {
      expect(parseLogLevel({ debug: true })).toBe(LogLevel.DEBUG);
    });

    it('trace takes precedence over debug and verbose', () => {
      expect(parseLogLevel({ trace: true, debug: true, verbose: true })).toBe(LogLevel.TRACE);
    });
  });

  describe('isLevelEnabled', () => {
    it('NORMAL level only enables NORMAL', () => {
      expect(logger.isLevelEnabled(LogLevel.NORMAL)).toBe(true);
      expect(logger.isLevelEnabled(LogLevel.VERBOSE)).toBe(false);
    });

    it('DEBUG level enables everything below TRACE', () => {
      logger.setLevel(LogLevel.DEBUG);
      expect(logger.getLevel()).toBe(LogLevel.DEBUG);
      expect(logger.isLevelEnabled(LogLevel.VERBOSE)).toBe(true);
      expect(logger.isLevelEnabled(LogLevel.DEBUG)).toBe(true);
      expect(logger.isLevelEnabled(LogLevel.TRACE)).toBe(false);
    });
  });

  describe('stage', () => {
    it('logs the stage with its duration at VERBOSE level', () => {
      logger.setLevel(LogLevel.VERBOSE);
      logger.stage('Retrieved 4 chunks', 1234, 'fast');
      expect(console.log).toHaveBeenCalledWith('✓ Retrieved 4 chunks (1.23s, fast)');
    });

    it('does not log at NORMAL level', () => {
      logger.stage('Retrieved', 10);
      expect(console.log).not.toHaveBeenCalled();
    });
  });

  describe('batchProgress', () => {
    it('logs at DEBUG level', () => {
      logger.setLevel(LogLevel.DEBUG);
      logger.batchProgress(2, 3, 100, 500);
      expect(console.log).toHaveBeenCalledWith('[Ingest] Batch 2/3: 100 chunks, 0.50s');
    });

    it('does not log at VERBOSE level', () => {
      logger.setLevel(LogLevel.VERBOSE);
      logger.batchProgress(1, 1, 10, 5);
      expect(console.log).not.toHaveBeenCalled();
    });
  });

  describe('retrieval', () => {
    it('includes the top score when present', () => {
      logger.setLevel(LogLevel.DEBUG);
      logger.retrieval(3, 4, 0.91234);
      logger.retrieval(0, 4);
      expect(console.log).toHaveBeenNthCalledWith(1, '[Retrieve] 3/4 documents, top score 0.912');
      expect(console.log).toHaveBeenNthCalledWith(2, '[Retrieve] 0/4 documents');
    });
  });

  describe('generationRequest', () => {
    it('logs provider, model and streaming mode', () => {
      logger.setLevel(LogLevel.DEBUG);
      logger.generationRequest('Mock', 'gpt-3.5-turbo', 120, true);
      expect(console.log).toHaveBeenCalledWith('[Generate] Mock/gpt-3.5-turbo (120 chars, streaming)...');
    });
  });

  describe('answerFull', () => {
    it('shows newlines escaped at TRACE level', () => {
      logger.setLevel(LogLevel.TRACE);
      logger.answerFull('line one\nline two', 0.5);
      expect(console.log).toHaveBeenCalledWith('[Answer] 0.500s "line one\\nline two"');
    });

    it('does not log at DEBUG level', () => {
      logger.setLevel(LogLevel.DEBUG);
      logger.answerFull('answer', 1);
      expect(console.log).not.toHaveBeenCalled();
    });
  });

  describe('promptFull', () => {
    it('logs the model and prompt at TRACE level', () => {
      logger.setLevel(LogLevel.TRACE);
      logger.promptFull('gpt-4', 'Context:\tA');
      expect(console.log).toHaveBeenCalledWith('  model: gpt-4');
      expect(console.log).toHaveBeenCalledWith('  prompt: "Context:\\tA"');
    });
  });

  describe('error', () => {
    it('always logs errors', () => {
      logger.error('test error');
      expect(console.error).toHaveBeenCalledWith('Error: test error');
    });

    it('includes stack trace at DEBUG level', () => {
      logger.setLevel(LogLevel.DEBUG);
      logger.error('test error', new Error('test'));
      expect(console.error).toHaveBeenCalledTimes(2);
    });
  });

  describe('warn', () => {
    it('always logs warnings', () => {
      logger.warn('test warning');
      expect(console.warn).toHaveBeenCalledWith('Warning: test warning');
    });
  });
});
