import { IndexStrategy } from '../types';
import { CorpusHolder } from '../corpus/statuteCorpus';
import { AnalysisService } from '../agent/analysisService';
import { CorpusStatus } from './schemas';

/**
 * Collaborators the routes work with. Owned by whoever creates the server.
 */
export interface AppContext {
  holder: CorpusHolder;
  analysis: AnalysisService;
  snapshotPath: string;
  strategy: IndexStrategy;
  resultCount: number;
  minScore?: number;
  excerptChars: number;
}

export interface RouteOptions {
  ctx: AppContext;
}

export function describeCorpus(ctx: AppContext): CorpusStatus {
  const corpus = ctx.holder.current();
  if (!corpus) {
    return {
      loaded: false,
      strategy: ctx.strategy,
      statutes: 0,
      articles: 0,
      documents: 0,
      fullStatuteDocuments: 0,
      articleDocuments: 0,
      snapshotPath: ctx.snapshotPath,
    };
  }
  return {
    loaded: true,
    version: corpus.version,
    strategy: corpus.index.strategy,
    builtAt: corpus.builtAt.toISOString(),
    ...corpus.summary(),
    snapshotPath: ctx.snapshotPath,
  };
}
