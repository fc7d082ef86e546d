import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { ConfigurationError, errorMessage } from './errors.js';
import type { LogLevelName } from './logger.js';

export type RecordingMode = 'press_to_toggle' | 'hold_to_record' | 'continuous';

export const RECORDING_MODES: readonly RecordingMode[] = ['press_to_toggle', 'hold_to_record', 'continuous'];

export type RecordingOptions = {
  activation_key: string;
  recording_mode: RecordingMode;
  sample_rate: number;
  /** Recordings shorter than this (ms) are treated as empty. */
  min_duration: number;
  /** Continuous mode: trailing silence (ms) after speech that ends the capture. */
  silence_duration: number;
  /** RMS level (int16 units) below which a chunk counts as silence. */
  silence_threshold: number;
  /** Capture program writing raw s16le mono PCM to stdout; empty picks a platform default. */
  capture_command: string;
};

export type CommonModelOptions = {
  language: string | null;
  initial_prompt: string | null;
  temperature: number;
};

export type ApiModelOptions = {
  base_url: string;
  model: string;
};

export type LocalModelOptions = {
  model: string;
  model_path: string | null;
  device: string;
  compute_type: string;
  condition_on_previous_text: boolean;
  vad_filter: boolean;
};

export type ModelOptions = {
  use_api: boolean;
  common: CommonModelOptions;
  api: ApiModelOptions;
  local: LocalModelOptions;
};

export type PostProcessingOptions = {
  remove_trailing_period: boolean;
  add_trailing_space: boolean;
  remove_capitalization: boolean;
};

export type VoiceCommandConfig = {
  phrase: string;
  command: string;
  args: string[];
};

export type MiscOptions = {
  print_to_terminal: boolean;
  hide_status_window: boolean;
  noise_on_completion: boolean;
  log_level: LogLevelName | 'auto';
  python_path: string;
};

export type AppConfig = {
  recording_options: RecordingOptions;
  model_options: ModelOptions;
  post_processing: PostProcessingOptions;
  voice_commands: VoiceCommandConfig[];
  misc: MiscOptions;
};

const LOG_LEVELS: ReadonlyArray<LogLevelName | 'auto'> = ['auto', 'silent', 'error', 'info', 'debug'];

export function createDefaultConfig(): AppConfig {
  return {
    recording_options: {
      activation_key: 'ctrl+shift+space',
      recording_mode: 'continuous',
      sample_rate: 16000,
      min_duration: 100,
      silence_duration: 900,
      silence_threshold: 500,
      capture_command: ''
    },
    model_options: {
      use_api: false,
      common: { language: null, initial_prompt: null, temperature: 0 },
      api: { base_url: 'https://api.openai.com/v1', model: 'whisper-1' },
      local: {
        model: 'base',
        model_path: null,
        device: 'auto',
        compute_type: 'default',
        condition_on_previous_text: true,
        vad_filter: false
      }
    },
    post_processing: {
      remove_trailing_period: false,
      add_trailing_space: true,
      remove_capitalization: false
    },
    voice_commands: [],
    misc: {
      print_to_terminal: true,
      hide_status_window: false,
      noise_on_completion: false,
      log_level: 'auto',
      python_path: ''
    }
  };
}

// ── Paths ─────────────────────────────────────────────────────────────────────
export function getDataDir(): string {
  const override = String(process.env.DICTATION_HOME || '').trim();
  if (override) return override;
  return path.join(os.homedir(), '.config', 'voice-dictation');
}

export function getConfigPath(): string {
  const override = String(process.env.DICTATION_CONFIG || '').trim();
  if (override) return override;
  return path.join(getDataDir(), 'config.json');
}

// ── Coercion helpers ──────────────────────────────────────────────────────────
function asRecord(value: unknown): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  if (!value || typeof value !== 'object' || Array.isArray(value)) return out;
  for (const [key, entry] of Object.entries(value)) out[key] = entry;
  return out;
}

function asString(value: unknown, fallback = ''): string {
  if (value === undefined || value === null) return fallback;
  const text = String(value).trim();
  return text || fallback;
}

function asNullableString(value: unknown, fallback: string | null): string | null {
  if (value === null) return null;
  if (value === undefined) return fallback;
  const text = String(value).trim();
  return text || null;
}

function asBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

function asNumber(value: unknown, fallback: number): number {
  if (value === undefined || value === null || value === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function isRecordingMode(value: unknown): value is RecordingMode {
  return typeof value === 'string' && RECORDING_MODES.some((mode) => mode === value);
}

function isLogLevel(value: string): value is LogLevelName | 'auto' {
  return LOG_LEVELS.some((lvl) => lvl === value);
}

// ── Section normalizers ───────────────────────────────────────────────────────
function normalizeRecordingOptions(raw: unknown, defaults: RecordingOptions): RecordingOptions {
  const obj = asRecord(raw);
  const mode = asString(obj.recording_mode, defaults.recording_mode).toLowerCase();
  if (!isRecordingMode(mode)) {
    throw new ConfigurationError(
      `recording_options.recording_mode must be one of ${RECORDING_MODES.join(', ')} (got "${mode}")`
    );
  }
  const sampleRate = asNumber(obj.sample_rate, defaults.sample_rate);
  if (!Number.isInteger(sampleRate) || sampleRate <= 0) {
    throw new ConfigurationError(`recording_options.sample_rate must be a positive integer (got ${String(obj.sample_rate)})`);
  }
  return {
    activation_key: asString(obj.activation_key, defaults.activation_key),
    recording_mode: mode,
    sample_rate: sampleRate,
    min_duration: Math.max(0, asNumber(obj.min_duration, defaults.min_duration)),
    silence_duration: Math.max(0, asNumber(obj.silence_duration, defaults.silence_duration)),
    silence_threshold: Math.max(0, asNumber(obj.silence_threshold, defaults.silence_threshold)),
    capture_command: asString(obj.capture_command, defaults.capture_command)
  };
}

function normalizeModelOptions(raw: unknown, defaults: ModelOptions): ModelOptions {
  const obj = asRecord(raw);
  const common = asRecord(obj.common);
  const api = asRecord(obj.api);
  const local = asRecord(obj.local);

  const temperature = asNumber(common.temperature, defaults.common.temperature);
  if (temperature < 0 || temperature > 1) {
    throw new ConfigurationError(`model_options.common.temperature must be between 0 and 1 (got ${temperature})`);
  }

  const normalized: ModelOptions = {
    use_api: asBoolean(obj.use_api, defaults.use_api),
    common: {
      language: asNullableString(common.language, defaults.common.language),
      initial_prompt: asNullableString(common.initial_prompt, defaults.common.initial_prompt),
      temperature
    },
    api: {
      base_url: asString(api.base_url, defaults.api.base_url),
      model: 'model' in api ? asString(api.model) : defaults.api.model
    },
    local: {
      model: 'model' in local ? asString(local.model) : defaults.local.model,
      model_path: asNullableString(local.model_path, defaults.local.model_path),
      device: asString(local.device, defaults.local.device),
      compute_type: asString(local.compute_type, defaults.local.compute_type),
      condition_on_previous_text: asBoolean(local.condition_on_previous_text, defaults.local.condition_on_previous_text),
      vad_filter: asBoolean(local.vad_filter, defaults.local.vad_filter)
    }
  };

  if (normalized.use_api && !normalized.api.model) {
    throw new ConfigurationError('model_options.api.model is required when model_options.use_api is true');
  }
  if (!normalized.use_api && !normalized.local.model && !normalized.local.model_path) {
    throw new ConfigurationError('model_options.local.model or model_options.local.model_path is required for local transcription');
  }
  return normalized;
}

function normalizePostProcessing(raw: unknown, defaults: PostProcessingOptions): PostProcessingOptions {
  const obj = asRecord(raw);
  return {
    remove_trailing_period: asBoolean(obj.remove_trailing_period, defaults.remove_trailing_period),
    add_trailing_space: asBoolean(obj.add_trailing_space, defaults.add_trailing_space),
    remove_capitalization: asBoolean(obj.remove_capitalization, defaults.remove_capitalization)
  };
}

function normalizeVoiceCommands(raw: unknown): VoiceCommandConfig[] {
  if (raw === undefined || raw === null) return [];
  if (!Array.isArray(raw)) throw new ConfigurationError('voice_commands must be a list');
  return raw.map((entry, idx) => {
    const obj = asRecord(entry);
    const phrase = asString(obj.phrase);
    const command = asString(obj.command);
    if (!phrase || !command) {
      throw new ConfigurationError(`voice_commands[${idx}] needs both "phrase" and "command"`);
    }
    const args = Array.isArray(obj.args) ? obj.args.map((arg) => String(arg)) : [];
    return { phrase, command, args };
  });
}

function normalizeMisc(raw: unknown, defaults: MiscOptions): MiscOptions {
  const obj = asRecord(raw);
  const logLevel = asString(obj.log_level, defaults.log_level).toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(`misc.log_level must be one of ${LOG_LEVELS.join(', ')} (got "${logLevel}")`);
  }
  return {
    print_to_terminal: asBoolean(obj.print_to_terminal, defaults.print_to_terminal),
    hide_status_window: asBoolean(obj.hide_status_window, defaults.hide_status_window),
    noise_on_completion: asBoolean(obj.noise_on_completion, defaults.noise_on_completion),
    log_level: logLevel,
    python_path: asString(obj.python_path, defaults.python_path)
  };
}

/** Merges `raw` over the defaults section by section; throws ConfigurationError on invalid values. */
export function normalizeConfig(raw: unknown): AppConfig {
  const defaults = createDefaultConfig();
  const obj = asRecord(raw);
  return {
    recording_options: normalizeRecordingOptions(obj.recording_options, defaults.recording_options),
    model_options: normalizeModelOptions(obj.model_options, defaults.model_options),
    post_processing: normalizePostProcessing(obj.post_processing, defaults.post_processing),
    voice_commands: normalizeVoiceCommands(obj.voice_commands),
    misc: normalizeMisc(obj.misc, defaults.misc)
  };
}

export function loadConfig(configPath = getConfigPath()): AppConfig {
  if (!fs.existsSync(configPath)) {
    const defaults = createDefaultConfig();
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, JSON.stringify(defaults, null, 2));
    return defaults;
  }

  const rawText = fs.readFileSync(configPath, 'utf8');
  let parsed: unknown = {};
  if (rawText.trim()) {
    try {
      parsed = JSON.parse(rawText);
    } catch (err) {
      throw new ConfigurationError(`Cannot parse ${configPath}: ${errorMessage(err)}`, { cause: err });
    }
  }
  return normalizeConfig(parsed);
}

export function saveConfig(cfg: unknown, configPath = getConfigPath()): AppConfig {
  const normalized = normalizeConfig(cfg);
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, JSON.stringify(normalized, null, 2));
  return normalized;
}
