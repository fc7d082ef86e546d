import type { PostProcessingOptions } from './config-manager.js';

export type PostProcessingConfig = {
  removeTrailingPeriod: boolean;
  addTrailingSpace: boolean;
  removeCapitalization: boolean;
};

export function toPostProcessingConfig(options: PostProcessingOptions): PostProcessingConfig {
  return {
    removeTrailingPeriod: options.remove_trailing_period,
    addTrailingSpace: options.add_trailing_space,
    removeCapitalization: options.remove_capitalization
  };
}

/**
 * Final text transforms, in a fixed order: trim, drop one trailing period,
 * append a space, lowercase. Lowercasing runs last so it also covers the
 * text the earlier steps leave in place.
 */
export function applyPostProcessing(text: string, config: PostProcessingConfig): string {
  let result = text.trim();
  if (config.removeTrailingPeriod && result.endsWith('.')) {
    result = result.slice(0, -1);
  }
  if (config.addTrailingSpace) {
    result += ' ';
  }
  if (config.removeCapitalization) {
    result = result.toLowerCase();
  }
  return result;
}
