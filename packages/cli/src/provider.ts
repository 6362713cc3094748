/**
 * Provider selection from CLI settings
 */

import { createAnthropicProvider } from "@stepwise/anthropic";
import type { Logger, Provider } from "@stepwise/core";
import { createOpenAIProvider } from "@stepwise/openai";
import type { Settings } from "./config.js";

export function createProvider(settings: Settings, logger?: Logger): Provider {
  const options = {
    apiKey: settings.apiKey,
    defaultModel: settings.model,
    baseURL: settings.baseURL,
    retry: settings.retry,
    logger,
  };

  switch (settings.provider) {
    case "anthropic":
      return createAnthropicProvider(options);
    case "openai":
      return createOpenAIProvider(options);
  }
}
