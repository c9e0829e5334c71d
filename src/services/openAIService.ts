import OpenAI, { AzureOpenAI } from 'openai';
import { LLMCallTrace } from '../types';
import { describeError, logger } from '../utils/logger';

export interface CompletionParams {
    prompt: string;
    systemMessage?: string;
    model?: string;
    maxTokens?: number;
    temperature?: number;
}

export interface CompletionResponse {
    content: string | null;
    llmTrace: LLMCallTrace;
}

/**
 * Text-generation service used by the external analysis mode.
 */
export interface CompletionClient {
    readonly configured: boolean;
    readonly model: string;
    complete(params: CompletionParams): Promise<CompletionResponse>;
}

export interface OpenAIClientOptions {
    apiKey: string;
    azureEndpoint?: string;
    azureApiVersion?: string;
    model: string;
    timeoutMs: number;
}

/**
 * Returns an Azure OpenAI client when an endpoint is configured, the regular
 * OpenAI client otherwise.
 */
function createOpenAIClient(options: OpenAIClientOptions): OpenAI {
    if (options.azureEndpoint) {
        logger.info('Using Azure OpenAI client');
        return new AzureOpenAI({
            apiKey: options.apiKey,
            endpoint: options.azureEndpoint,
            apiVersion: options.azureApiVersion,
            deployment: options.model,
            timeout: options.timeoutMs,
        });
    }
    logger.info('Using regular OpenAI client');
    return new OpenAI({ apiKey: options.apiKey, timeout: options.timeoutMs });
}

export class OpenAICompletionClient implements CompletionClient {
    private client: OpenAI | undefined;

    constructor(private readonly options: OpenAIClientOptions) {}

    get configured(): boolean {
        return this.options.apiKey.length > 0;
    }

    get model(): string {
        return this.options.model;
    }

    private getClient(): OpenAI {
        if (!this.client) {
            this.client = createOpenAIClient(this.options);
        }
        return this.client;
    }

    /**
     * Errors are reported in the trace rather than thrown.
     */
    async complete({
        prompt,
        systemMessage = 'You are a helpful assistant.',
        model = this.options.model,
        maxTokens = 1500,
        temperature = 0.1,
    }: CompletionParams): Promise<CompletionResponse> {
        const startTime = new Date();
        let responseContent: string | null = null;
        let errorMsg: string | undefined;

        if (!this.configured) {
            errorMsg = 'OPENAI_API_KEY is not configured.';
        } else {
            try {
                const completion = await this.getClient().chat.completions.create({
                    model,
                    messages: [
                        { role: 'system', content: systemMessage },
                        { role: 'user', content: prompt },
                    ],
                    max_tokens: maxTokens,
                    temperature,
                });
                responseContent = completion.choices[0]?.message?.content || null;
                if (!responseContent) {
                    errorMsg = 'The model returned an empty completion.';
                }
            } catch (error) {
                logger.error({ err: error }, 'Error calling OpenAI/Azure API');
                errorMsg = describeError(error);
            }
        }

        const llmTrace: LLMCallTrace = {
            prompt: `System: ${systemMessage}\nUser: ${prompt}`,
            response: responseContent,
            model,
            timestamp: startTime.toISOString(),
            error: errorMsg,
        };

        return { content: responseContent, llmTrace };
    }
}
