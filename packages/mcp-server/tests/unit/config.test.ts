import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { describeConfigProblems, loadConfig, loadEnvFile, validateConfig } from '../../src/config';
import type { Config } from '../../src/config';

describe('config', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'assembler-config-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('loadConfig', () => {
    it('should apply defaults', () => {
      const config = loadConfig({ MANUSCRIPT_WORKSPACE_ROOT: tempDir });

      expect(config).toMatchObject({
        workspaceRoot: tempDir,
        defaultTemplate: 'medical-article',
        defaultCitationStyle: 'numeric',
        outputDir: 'build',
        logLevel: 'info',
      });
      expect(path.basename(config.templatesDir)).toBe('templates');
    });

    it('should read overrides from the environment', () => {
      const config = loadConfig({
        MANUSCRIPT_WORKSPACE_ROOT: tempDir,
        TEMPLATES_DIR: '/opt/templates',
        DEFAULT_TEMPLATE: 'letter',
        DEFAULT_CITATION_STYLE: 'natbib',
        OUTPUT_DIR: 'out',
        LOG_LEVEL: 'debug',
      });

      expect(config).toEqual({
        workspaceRoot: tempDir,
        templatesDir: '/opt/templates',
        defaultTemplate: 'letter',
        defaultCitationStyle: 'natbib',
        outputDir: 'out',
        logLevel: 'debug',
      });
    });
  });

  describe('loadEnvFile', () => {
    it('should load .env values without overriding set variables', async () => {
      await fs.writeFile(
        path.join(tempDir, '.env'),
        '# comment\nOUTPUT_DIR=from-file\nLOG_LEVEL = warn\n\nDEFAULT_TEMPLATE=a=b\n'
      );
      const env: NodeJS.ProcessEnv = { MANUSCRIPT_WORKSPACE_ROOT: tempDir, OUTPUT_DIR: 'from-env' };

      loadEnvFile(env);

      expect(env.OUTPUT_DIR).toBe('from-env');
      expect(env.LOG_LEVEL).toBe('warn');
      expect(env.DEFAULT_TEMPLATE).toBe('a=b');
    });
  });

  describe('validateConfig', () => {
    const valid: Config = {
      workspaceRoot: '/work',
      templatesDir: '/templates',
      defaultTemplate: 'medical-article',
      defaultCitationStyle: 'numeric',
      outputDir: 'build',
      logLevel: 'info',
    };

    it('should accept a valid configuration', () => {
      expect(validateConfig(valid)).toEqual([]);
    });

    it('should list every problem', () => {
      expect(
        validateConfig({ ...valid, defaultCitationStyle: 'apa', logLevel: 'loud', outputDir: ' ', defaultTemplate: '' })
      ).toEqual([
        'DEFAULT_TEMPLATE cannot be empty',
        'OUTPUT_DIR cannot be empty',
        'DEFAULT_CITATION_STYLE must be one of: numeric, natbib, biblatex',
        'LOG_LEVEL must be one of: debug, info, warn, error, silent',
      ]);
    });
  });

  describe('describeConfigProblems', () => {
    it('should turn each problem into a configuration error response', () => {
      const config: Config = {
        workspaceRoot: '/work',
        templatesDir: '/templates',
        defaultTemplate: 'medical-article',
        defaultCitationStyle: 'apa',
        outputDir: 'build',
        logLevel: 'info',
      };

      const problems = describeConfigProblems(config);

      expect(problems).toHaveLength(1);
      expect(problems[0]).toMatchObject({
        error: 'VALIDATION_ERROR',
        message: 'Configuration error: DEFAULT_CITATION_STYLE - must be one of: numeric, natbib, biblatex',
        context: { configKey: 'DEFAULT_CITATION_STYLE', issue: 'must be one of: numeric, natbib, biblatex' },
      });
      expect(problems[0].suggestions?.[0]).toBe('Check the DEFAULT_CITATION_STYLE configuration value');
    });
  });
});
