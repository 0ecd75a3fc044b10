import { existsSync, readFileSync } from 'fs';
import { dirname, isAbsolute, join, resolve } from 'path';
import { err, ok, type Result } from 'neverthrow';
import { parse as parseYaml } from 'yaml';
import { SettingsSchema, type AppError, type Settings } from '../../../shared/src';
import { createAppError } from '../errors';

export const DEFAULT_CONFIG_RELATIVE_PATH = join('config', 'config.yml');

export type LoadedConfig = {
  file: string;
  configDir: string;
  settings: Settings;
};

export function getConfigPath(explicit?: string): string {
  const chosen = explicit?.trim() || process.env.CHIP_WARDEN_CONFIG_PATH?.trim();
  return resolve(chosen || DEFAULT_CONFIG_RELATIVE_PATH);
}

function resolvePaths(settings: Settings, baseDir: string): Settings {
  const abs = (p: string) => (isAbsolute(p) ? p : resolve(baseDir, p));
  return {
    ...settings,
    paths: {
      watchDir: abs(settings.paths.watchDir),
      archiveRoot: abs(settings.paths.archiveRoot),
      publishDir: abs(settings.paths.publishDir),
      logDir: abs(settings.paths.logDir)
    }
  };
}

export function parseConfig(raw: string, file: string): Result<Settings, AppError> {
  let document: unknown;
  try {
    document = parseYaml(raw);
  } catch (error) {
    return err(
      createAppError('config.invalidYaml', `Config file is not valid YAML: ${file}`, {
        reason: error instanceof Error ? error.message : String(error)
      })
    );
  }
  const parsed = SettingsSchema.safeParse(document ?? {});
  if (!parsed.success) {
    return err(
      createAppError('config.invalid', `Config file has invalid settings: ${file}`, {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      })
    );
  }
  return ok(resolvePaths(parsed.data, dirname(file)));
}

/**
 * Reads and validates the YAML config. Relative paths in it are resolved
 * against the directory holding the file.
 */
export function loadConfig(explicit?: string): Result<LoadedConfig, AppError> {
  const file = getConfigPath(explicit);
  if (!existsSync(file)) {
    return err(
      createAppError('config.missing', `Config file not found: ${file}`, {
        hint: 'Copy config/config.example.yml to config/config.yml and customise it'
      })
    );
  }
  let raw: string;
  try {
    raw = readFileSync(file, 'utf8');
  } catch (error) {
    return err(
      createAppError('config.unreadable', `Config file could not be read: ${file}`, {
        reason: error instanceof Error ? error.message : String(error)
      })
    );
  }
  return parseConfig(raw, file).map((settings) => ({ file, configDir: dirname(file), settings }));
}
