/**
 * Model Presets
 *
 * Named base URL + model pairs selectable with ROWFILL_PRESET. "custom"
 * carries no defaults; base URL and model must then be configured.
 */

import type { ModelPreset } from "./types.js";

const DASHSCOPE = "https://dashscope.aliyuncs.com/compatible-mode/v1";

export const MODEL_PRESETS: readonly ModelPreset[] = [
  {
    id: "deepseek-chat",
    label: "DeepSeek Chat",
    baseUrl: "https://api.deepseek.com",
    model: "deepseek-chat",
    provider: "deepseek",
    description: "DeepSeek official API",
  },
  {
    id: "deepseek-reasoner",
    label: "DeepSeek Reasoner",
    baseUrl: "https://api.deepseek.com",
    model: "deepseek-reasoner",
    provider: "deepseek",
    description: "DeepSeek reasoning model",
  },
  {
    id: "deepseek-v3",
    label: "DeepSeek V3 (DashScope)",
    baseUrl: DASHSCOPE,
    model: "deepseek-v3",
    provider: "dashscope",
    description: "DeepSeek V3 hosted on DashScope, supports deep thinking",
  },
  {
    id: "deepseek-v3.2",
    label: "DeepSeek V3.2 (DashScope)",
    baseUrl: DASHSCOPE,
    model: "deepseek-v3.2",
    provider: "dashscope",
    description: "DeepSeek V3.2 hosted on DashScope",
  },
  {
    id: "deepseek-r1",
    label: "DeepSeek R1 (DashScope)",
    baseUrl: DASHSCOPE,
    model: "deepseek-r1",
    provider: "dashscope",
    description: "DeepSeek R1 hosted on DashScope, supports web search",
  },
  {
    id: "qwen-turbo",
    label: "Qwen Turbo",
    baseUrl: DASHSCOPE,
    model: "qwen-turbo",
    provider: "dashscope",
    description: "Qwen fast tier",
  },
  {
    id: "qwen-plus",
    label: "Qwen Plus",
    baseUrl: DASHSCOPE,
    model: "qwen-plus",
    provider: "dashscope",
    description: "Qwen enhanced tier",
  },
  {
    id: "qwen-max",
    label: "Qwen Max",
    baseUrl: DASHSCOPE,
    model: "qwen-max",
    provider: "dashscope",
    description: "Qwen flagship tier",
  },
  {
    id: "custom",
    label: "Custom",
    baseUrl: "",
    model: "",
    provider: "custom",
    description: "Any OpenAI-compatible endpoint",
  },
];

export function findPreset(id: string): ModelPreset | undefined {
  return MODEL_PRESETS.find(p => p.id === id);
}
