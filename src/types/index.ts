// Core types for Thread Radar

export const DELETED_AUTHOR = '[deleted]';

export type ListingSort = 'new' | 'hot';

export const SORT_ORDERS = ['relevance', 'date', 'relevance_date', 'engagement'] as const;

export type SortBy = (typeof SORT_ORDERS)[number];

export type RelevanceCategory = 'legal' | 'translation' | 'combined';

export const POST_STYLES = ['professional', 'empathetic', 'educational', 'storytelling'] as const;

export type PostStyle = (typeof POST_STYLES)[number];

export interface Vocabularies {
  readonly legal: readonly string[];
  readonly translation: readonly string[];
}

export interface Relevance {
  readonly legal: number;
  readonly translation: number;
  readonly combined: number;
  readonly legalMatches: number;
  readonly translationMatches: number;
}

export interface Thread {
  readonly id: string;
  readonly source: string;
  readonly title: string;
  readonly body: string;
  readonly url: string;
  readonly score: number;
  readonly numComments: number;
  readonly createdAt: Date;
  readonly author: string;
  readonly relevance: Relevance;
  readonly category: string | null;
}

export interface Reply {
  readonly id: string;
  readonly threadId: string;
  readonly body: string;
  readonly score: number;
  readonly author: string;
  readonly createdAt: Date;
  readonly relevance: Relevance;
  readonly isOp: boolean;
}

export interface RecordWithReplies {
  thread: Thread;
  replies: Reply[];
  insights: string[];
}

export interface GeneratedPost {
  readonly content: string;
  readonly sourceTitle: string;
  readonly sourceUrl: string;
  readonly generatedAt: string;
  readonly style: PostStyle;
}

export interface SourceScanResult {
  source: string;
  newCount: number;
  hotCount: number;
  added: number;
  error?: string;
}

export interface ScanResult {
  threads: Thread[];
  sources: SourceScanResult[];
}

export interface PipelineStats {
  totalScanned: number;
  relevantThreads: number;
  postsGenerated?: number;
}

export interface PipelineResult {
  runTimestamp: string;
  config: {
    perSourceLimit: number;
    minRelevance: number;
    maxRecords: number;
  };
  stats: PipelineStats;
  sources: SourceScanResult[];
  records: RecordWithReplies[];
  generatedPosts: GeneratedPost[];
  generationError?: string;
  files?: string[];
}
