import { RetrievableDocument, Statute } from '../src/types';
import { CompletionClient, CompletionParams, CompletionResponse } from '../src/services/openAIService';

export function makeDocument(id: string, ordinal: number, text: string, label = id): RetrievableDocument {
  const statute: Statute = { title: label, url: '', fullText: text, keyword: '', articles: [] };
  return {
    id,
    ordinal,
    text,
    label,
    kind: 'full_statute',
    sourceRef: { statute },
    metadata: { statuteTitle: label, keyword: '', url: '' },
  };
}

export function makeDocuments(...texts: string[]): RetrievableDocument[] {
  return texts.map((text, i) => makeDocument(`d${i}`, i, text));
}

/** Two statutes whose articles carry no full text. */
export function sampleStatutes(): Statute[] {
  return [
    {
      title: '하도급법',
      url: 'https://example.test/subcontract',
      fullText: '',
      keyword: '하도급',
      articles: [
        { number: '1', heading: '목적', body: '거래 질서 확립' },
        { number: '13', heading: '대금 지급', body: '원사업자는 60일 이내에 대금 지급' },
      ],
    },
    {
      title: '상생협력법',
      url: 'https://example.test/cooperation',
      fullText: '',
      keyword: '상생협력',
      articles: [{ number: '1', heading: '목적', body: '동반 성장 촉진' }],
    },
  ];
}

export class FakeCompletionClient implements CompletionClient {
  readonly model = 'test-model';
  readonly prompts: CompletionParams[] = [];
  content: string | null = 'AI 분석 결과';
  failure: string | undefined;

  constructor(public configured = true) {}

  async complete(params: CompletionParams): Promise<CompletionResponse> {
    this.prompts.push(params);
    if (this.failure) {
      throw new Error(this.failure);
    }
    return {
      content: this.content,
      llmTrace: {
        prompt: params.prompt,
        response: this.content,
        model: this.model,
        timestamp: '2024-01-01T00:00:00.000Z',
        error: this.content ? undefined : 'quota exceeded',
      },
    };
  }
}
