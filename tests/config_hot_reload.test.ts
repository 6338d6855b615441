import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigManager, loadConfigFromFile, parseConfig, validateConfig } from '../src/config/index.js';
import type { ConfigReloadEvent, GridDetectConfig } from '../src/config/index.js';

const DEFAULT_CONFIG_PATH = 'config/default.json';

function defaultConfig(): GridDetectConfig {
  return loadConfigFromFile(DEFAULT_CONFIG_PATH);
}

describe('ConfigLoader', () => {
  it('loads the shipped defaults', () => {
    const config = defaultConfig();

    expect(config.app.name).toBe('grid-detect');
    expect(config.detection.gridSize).toBe(7);
    expect(config.detection.classCount).toBe(20);
    expect(config.detection.boxesPerCell).toBe(2);
    expect(config.detection.threshold).toBe(0.2);
    expect(config.detection.iouThreshold).toBe(0.5);
    expect(config.detection.labels).toHaveLength(20);
    expect(config.detection.labels[0]).toBe('aeroplane');
    expect(config.detection.labels[14]).toBe('person');
    expect(config.detection.labels[19]).toBe('tvmonitor');
  });

  it('ConfigSchema reports missing sections and unknown keys', () => {
    const withoutDetection = Object.fromEntries(
      Object.entries(defaultConfig()).filter(([key]) => key !== 'detection')
    );
    expect(() => validateConfig(withoutDetection)).toThrow('config.detection is required');

    const extra = { ...defaultConfig(), extra: true };
    expect(() => validateConfig(extra)).toThrow('config.extra is not allowed');

    expect(() => validateConfig([])).toThrow('config must be an object');
  });

  it('ConfigSchema reports numeric range and type errors in schema order', () => {
    const config = defaultConfig();
    config.detection.gridSize = 0;
    config.detection.threshold = 2;

    expect(() => validateConfig(config)).toThrow(
      'config.detection.gridSize must be >= 1; config.detection.threshold must be <= 1'
    );

    const fractional = defaultConfig();
    fractional.detection.boxesPerCell = 1.5;
    expect(() => validateConfig(fractional)).toThrow('config.detection.boxesPerCell must be an integer');
  });

  it('ConfigSchema restricts log levels to the pino names', () => {
    const config = defaultConfig();
    config.logging.level = 'loud';

    expect(() => validateConfig(config)).toThrow(
      'config.logging.level must be one of fatal, error, warn, info, debug, trace, silent'
    );
  });

  it('ConfigLogical requires one distinct label per class', () => {
    const short = defaultConfig();
    short.detection.labels = short.detection.labels.slice(0, 19);
    expect(() => validateConfig(short)).toThrow('config.detection.labels lists 19 label(s) but classCount is 20');

    const duplicate = defaultConfig();
    duplicate.detection.labels[15] = ' person ';
    expect(() => validateConfig(duplicate)).toThrow(
      'config.detection.labels[15] duplicates label "person" already used by config.detection.labels[14]'
    );

    const blank = defaultConfig();
    blank.detection.labels[3] = '   ';
    expect(() => validateConfig(blank)).toThrow('config.detection.labels[3] must be a non-empty string');
  });

  it('ConfigLogical accepts optional selection settings', () => {
    const config = defaultConfig();
    config.detection.classAware = true;
    config.detection.maxDetections = 5;

    expect(() => validateConfig(config)).not.toThrow();
  });

  it('ConfigParse wraps malformed JSON', () => {
    expect(() => parseConfig('{')).toThrow(/^Failed to parse configuration: /);
  });
});

describe('ConfigHotReload', () => {
  let tempDir: string;
  let configPath: string;

  const writeConfig = (config: GridDetectConfig) => {
    fs.writeFileSync(configPath, JSON.stringify(config, null, 2), 'utf-8');
  };

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'grid-config-'));
    configPath = path.join(tempDir, 'config.json');
    writeConfig(defaultConfig());
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('ConfigHotReload emits the previous and next configuration', () => {
    const manager = new ConfigManager(configPath);
    const events: ConfigReloadEvent[] = [];
    manager.on('reload', (event: ConfigReloadEvent) => {
      events.push(event);
    });

    const updated = defaultConfig();
    updated.detection.threshold = 0.35;
    writeConfig(updated);
    const next = manager.reload();

    expect(manager.getPath()).toBe(path.resolve(configPath));
    expect(next.detection.threshold).toBe(0.35);
    expect(manager.getConfig()).toBe(next);
    expect(events).toHaveLength(1);
    const [event] = events;
    expect(event.previous.detection.threshold).toBe(0.2);
    expect(event.next.detection.threshold).toBe(0.35);
  });

  it('ConfigHotReload keeps the active configuration when the file turns invalid', () => {
    const manager = new ConfigManager(configPath);
    const listener = vi.fn();
    manager.on('reload', listener);
    const before = manager.getConfig();

    fs.writeFileSync(configPath, '{ "app": ', 'utf-8');
    expect(() => manager.reload()).toThrow(/^Failed to parse configuration: /);

    const invalid = defaultConfig();
    invalid.detection.iouThreshold = -0.1;
    writeConfig(invalid);
    expect(() => manager.reload()).toThrow('config.detection.iouThreshold must be >= 0');

    expect(manager.getConfig()).toBe(before);
    expect(listener).not.toHaveBeenCalled();
  });
});
