/**
 * OpenAI code-interpreter backend.
 *
 * Runs are Responses API calls with the code_interpreter tool in background
 * mode; the dataset is attached to the auto-created container as a file.
 */

import OpenAI, { toFile, type ClientOptions } from "openai";
import type { Response as OpenAIResponse } from "openai/resources/responses/responses";
import type {
  CodeInterpreterBackend,
  RunStatus,
  SandboxFile,
  SandboxRun,
  StartRunRequest,
} from "./types";

/** The parts of a Responses API response a sandbox run is read from */
export type ResponseSnapshot = Pick<
  OpenAIResponse,
  "id" | "status" | "output" | "output_text" | "usage" | "error" | "incomplete_details"
>;

export function toSandboxRun(response: ResponseSnapshot): SandboxRun {
  let containerId: string | null = null;
  for (const item of response.output) {
    if (item.type === "code_interpreter_call") {
      containerId = item.container_id;
      break;
    }
  }

  const status: RunStatus = response.status ?? "in_progress";

  return {
    id: response.id,
    status,
    outputText: response.output_text ?? "",
    containerId,
    usage: response.usage
      ? {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        }
      : null,
    error: response.error?.message ?? response.incomplete_details?.reason ?? null,
  };
}

export class OpenAICodeInterpreterBackend implements CodeInterpreterBackend {
  private readonly client: OpenAI;

  constructor(apiKey: string, options: Omit<ClientOptions, "apiKey"> = {}) {
    this.client = new OpenAI({ ...options, apiKey });
  }

  async uploadFile(name: string, content: string): Promise<string> {
    const file = await this.client.files.create({
      file: await toFile(Buffer.from(content, "utf8"), name),
      purpose: "user_data",
    });
    return file.id;
  }

  async startRun(request: StartRunRequest): Promise<SandboxRun> {
    const response = await this.client.responses.create({
      model: request.model,
      instructions: request.instructions,
      input: request.prompt,
      tools: [
        {
          type: "code_interpreter",
          container: { type: "auto", file_ids: request.fileIds },
        },
      ],
      background: true,
    });
    return toSandboxRun(response);
  }

  async getRun(runId: string): Promise<SandboxRun> {
    const response = await this.client.responses.retrieve(runId);
    return toSandboxRun(response);
  }

  async cancelRun(runId: string): Promise<void> {
    await this.client.responses.cancel(runId);
  }

  async listOutputFiles(containerId: string): Promise<SandboxFile[]> {
    const files: SandboxFile[] = [];
    for await (const file of this.client.containers.files.list(containerId)) {
      // Skip the uploaded dataset; keep what the code wrote
      if (file.source === "user") continue;
      files.push({ id: file.id, path: file.path });
    }
    return files;
  }

  async downloadFile(containerId: string, fileId: string): Promise<Uint8Array> {
    const response = await this.client.containers.files.content.retrieve(fileId, {
      container_id: containerId,
    });
    return new Uint8Array(await response.arrayBuffer());
  }

  async deleteFile(fileId: string): Promise<void> {
    await this.client.files.delete(fileId);
  }
}
