/**
 * Configuration Management
 *
 * Centralized configuration for the profiling pipeline with environment
 * variable support. Precedence: defaults < environment < explicit overrides.
 */

import '../../shared/runtime';
import { ProfilerErrorFactory } from '../errors/types';
import { ProfilerConfigSchema } from '../validation/schemas';
import { cpus } from 'os';

/**
 * Complete profiler configuration
 */
export interface ProfilerConfig {
  synthesis: {
    /** Minimum summed confidence for a field to resolve */
    resolutionThreshold: number;
    /** Confidence multiplier applied when a date range is swapped */
    swapPenalty: number;
  };

  extraction: {
    /** Minimum similarity for a fuzzy organization lexicon match */
    fuzzyMatchThreshold: number;
  };

  processing: {
    concurrency: number;
    rubricPath: string;
  };

  logging: {
    enabled: boolean;
    maxLogs: number;
  };
}

export type ProfilerConfigOverrides = {
  [K in keyof ProfilerConfig]?: Partial<ProfilerConfig[K]>;
};

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: ProfilerConfig = {
  synthesis: {
    resolutionThreshold: 0.5,
    swapPenalty: 0.9
  },
  extraction: {
    fuzzyMatchThreshold: 0.8
  },
  processing: {
    concurrency: Math.max(1, cpus().length),
    rubricPath: 'config/rubric.default.json'
  },
  logging: {
    enabled: true,
    maxLogs: 5000
  }
};

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: ProfilerConfig;

  constructor(config?: ProfilerConfigOverrides, env: NodeJS.ProcessEnv = process.env) {
    this.config = this.merge(this.loadFromEnv(env), config);
    this.validateConfig();
  }

  /**
   * Read configuration from environment variables, falling back to defaults
   */
  private loadFromEnv(env: NodeJS.ProcessEnv): ProfilerConfig {
    return {
      synthesis: {
        resolutionThreshold: this.parseFloat(env.PROFILER_RESOLUTION_THRESHOLD, DEFAULT_CONFIG.synthesis.resolutionThreshold),
        swapPenalty: this.parseFloat(env.PROFILER_SWAP_PENALTY, DEFAULT_CONFIG.synthesis.swapPenalty)
      },
      extraction: {
        fuzzyMatchThreshold: this.parseFloat(env.PROFILER_FUZZY_MATCH_THRESHOLD, DEFAULT_CONFIG.extraction.fuzzyMatchThreshold)
      },
      processing: {
        concurrency: this.parseInt(env.PROFILER_CONCURRENCY, DEFAULT_CONFIG.processing.concurrency),
        rubricPath: env.PROFILER_RUBRIC_PATH || DEFAULT_CONFIG.processing.rubricPath
      },
      logging: {
        enabled: env.PROFILER_LOGGING_ENABLED !== 'false',
        maxLogs: this.parseInt(env.PROFILER_MAX_LOGS, DEFAULT_CONFIG.logging.maxLogs)
      }
    };
  }

  /**
   * Validate configuration
   */
  private validateConfig(): void {
    const result = ProfilerConfigSchema.safeParse(this.config);

    if (!result.success) {
      const [issue] = result.error.errors;
      throw ProfilerErrorFactory.configurationError(
        issue.path.join('.'),
        issue.message
      );
    }
  }

  getConfig(): ProfilerConfig {
    return this.merge(this.config);
  }

  /**
   * Update configuration
   */
  updateConfig(updates: ProfilerConfigOverrides): void {
    const previous = this.config;
    this.config = this.merge(this.config, updates);
    try {
      this.validateConfig();
    } catch (error) {
      this.config = previous;
      throw error;
    }
  }

  getSynthesisConfig(): ProfilerConfig['synthesis'] {
    return { ...this.config.synthesis };
  }

  getExtractionConfig(): ProfilerConfig['extraction'] {
    return { ...this.config.extraction };
  }

  getProcessingConfig(): ProfilerConfig['processing'] {
    return { ...this.config.processing };
  }

  getLoggingConfig(): ProfilerConfig['logging'] {
    return { ...this.config.logging };
  }

  /**
   * Parse integer from environment variable
   */
  private parseInt(value: string | undefined, defaultValue: number): number {
    if (!value) return defaultValue;
    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? defaultValue : parsed;
  }

  /**
   * Parse float from environment variable
   */
  private parseFloat(value: string | undefined, defaultValue: number): number {
    if (!value) return defaultValue;
    const parsed = parseFloat(value);
    return isNaN(parsed) ? defaultValue : parsed;
  }

  /**
   * Merge overrides section by section
   */
  private merge(base: ProfilerConfig, overrides: ProfilerConfigOverrides = {}): ProfilerConfig {
    return {
      synthesis: { ...base.synthesis, ...overrides.synthesis },
      extraction: { ...base.extraction, ...overrides.extraction },
      processing: { ...base.processing, ...overrides.processing },
      logging: { ...base.logging, ...overrides.logging }
    };
  }
}

/**
 * Global configuration instance
 */
let globalConfig: ConfigManager | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(config?: ProfilerConfigOverrides): ConfigManager {
  globalConfig = new ConfigManager(config);
  return globalConfig;
}

/**
 * Get global configuration
 */
export function getConfig(): ConfigManager {
  if (!globalConfig) {
    globalConfig = new ConfigManager();
  }
  return globalConfig;
}

/**
 * Reset configuration to defaults
 */
export function resetConfig(): void {
  globalConfig = new ConfigManager();
}
