import { LLMAdapter } from "./llmAdapter";
import { OpenAIAdapter } from "./openAIAdapter";
import { HuggingFaceAdapter } from "./huggingFaceAdapter";
import {
  ResourceCache,
  SecretGatedResourceDefinition,
  SecretProvider,
} from "./secretGatedResource";

export type ModelName = "gpt35" | "starcoder";

export type ModelDefinitions = Record<ModelName, SecretGatedResourceDefinition<LLMAdapter>>;

export const defaultModelDefinitions: ModelDefinitions = {
  gpt35: {
    secretName: "OPENAI_API_KEY",
    prompt: "Please add your OpenAI API key to the .env file",
    create: (apiKey) => new OpenAIAdapter({ apiKey, model: "gpt-3.5-turbo" }),
  },
  starcoder: {
    secretName: "HUGGING_FACE_TOKEN",
    prompt: "Please add your Hugging Face token to the .env file",
    create: (apiKey) => new HuggingFaceAdapter({ apiKey }),
  },
};

/**
 * Shared by every session in the process.
 */
export const modelCache = new ResourceCache<LLMAdapter>();

/**
 * Lazily constructed model clients available to steps.
 *
 * Each accessor evaluates to the cached construction promise, so
 * `await sdk.models.gpt35` asks for the secret at most once per process.
 */
export class Models {
  constructor(
    private readonly secrets: SecretProvider,
    private readonly definitions: ModelDefinitions = defaultModelDefinitions,
    private readonly cache: ResourceCache<LLMAdapter> = modelCache,
  ) {}

  get gpt35(): Promise<LLMAdapter> {
    return this.get("gpt35");
  }

  get starcoder(): Promise<LLMAdapter> {
    return this.get("starcoder");
  }

  get(name: ModelName): Promise<LLMAdapter> {
    return this.cache.acquire(name, this.definitions[name], this.secrets);
  }

  /**
   * The model if it has already been constructed, without prompting.
   */
  peek(name: ModelName): LLMAdapter | undefined {
    return this.cache.peek(name);
  }
}
