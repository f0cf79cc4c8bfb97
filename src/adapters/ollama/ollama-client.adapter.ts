import axios from "axios";
import {
  LlmClientPort,
  ModelSummary,
} from "../../ports/outbound/llm-client.port";
import { ChatMessage } from "../../shared/types/chat";

interface OllamaChatResponse {
  message?: {
    role: "assistant";
    content: string;
  };
  done: boolean;
}

export class OllamaClientAdapter implements LlmClientPort {
  constructor(
    private readonly baseUrl: string = process.env.OLLAMA_BASE_URL ||
      "http://localhost:11434",
  ) {}

  async listModels(): Promise<ModelSummary[]> {
    try {
      const response = await axios.get<{ models?: Array<{ name: string }> }>(
        `${this.baseUrl}/api/tags`,
      );
      return (response.data.models ?? []).map((m) => ({ name: m.name }));
    } catch (error) {
      throw new Error(
        `Failed to list Ollama models: ${this.getErrorMessage(error)}`,
      );
    }
  }

  async chat(
    model: string,
    messages: ChatMessage[],
    signal?: AbortSignal,
  ): Promise<string> {
    try {
      const response = await axios.post<OllamaChatResponse>(
        `${this.baseUrl}/api/chat`,
        { model, messages, stream: false },
        {
          headers: { "Content-Type": "application/json" },
          signal,
        },
      );
      return response.data.message?.content ?? "";
    } catch (error) {
      throw new Error(
        `Ollama chat request failed: ${this.getErrorMessage(error)}`,
      );
    }
  }

  private getErrorMessage(error: unknown): string {
    if (axios.isAxiosError<{ error?: string }>(error)) {
      const status = error.response?.status;
      const statusText = error.response?.statusText;
      const detail = error.response?.data?.error;
      return [
        status ? `${status}` : undefined,
        statusText,
        detail,
        error.message,
      ]
        .filter(Boolean)
        .join(" / ");
    }

    if (error instanceof Error) {
      return error.message;
    }

    return String(error);
  }
}
