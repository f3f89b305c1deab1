import { Dispatcher } from "undici";
import { AppConfig, MODEL_API_KEY_ENV_NAME } from "../config";
import { InvalidArgumentError } from "../core/errors";
import { getFetchDispatcher } from "../core/fetch";
import { ChatProvider } from "./chatProvider";
import { OllamaChatProvider } from "./ollamaProvider";
import { OpenAiChatProvider } from "./openAiProvider";
import { ProviderSpec } from "./providerUri";

export function createChatProvider(providerSpec: ProviderSpec, config: AppConfig, dispatcher?: Dispatcher): ChatProvider {
  const sharedDispatcher = dispatcher ?? getFetchDispatcher(config.ignoreHttpsErrors);

  switch (providerSpec.backend) {
    case "ollama":
      return new OllamaChatProvider({
        baseUrl: config.providers.ollamaBaseUrl,
        model: providerSpec.model,
        apiKey: config.modelApiKey,
        dispatcher: sharedDispatcher,
      });
    case "openai":
    case "openrouter": {
      if (!config.modelApiKey) {
        throw new InvalidArgumentError(`Backend "${providerSpec.backend}" needs an API key in ${MODEL_API_KEY_ENV_NAME}`);
      }
      return new OpenAiChatProvider({
        id: providerSpec.backend,
        baseUrl: providerSpec.backend === "openai" ? config.providers.openaiBaseUrl : config.providers.openrouterBaseUrl,
        model: providerSpec.model,
        apiKey: config.modelApiKey,
        dispatcher: sharedDispatcher,
      });
    }
  }
}
