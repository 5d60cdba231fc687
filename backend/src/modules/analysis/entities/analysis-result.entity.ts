import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { SubmittedUrl } from '../../urls/entities/submitted-url.entity';

export const CONFIDENCE_LEVELS = ['high', 'medium', 'low'] as const;

export type ConfidenceLevel = (typeof CONFIDENCE_LEVELS)[number];

/**
 * Raw output of an external analyzer (reputation service, heuristic engine).
 * Stored verbatim, never interpreted.
 */
export type AnalyzerPayload = Record<string, unknown>;

export const MIN_RISK_SCORE = 0;
export const MAX_RISK_SCORE = 100;

@Index('idx_analysis_results_url_id', ['urlId'])
@Index('idx_analysis_results_analysis_date', ['analysisDate'])
@Index('idx_analysis_results_is_phishing', ['isPhishing'])
@Entity('analysis_results')
export class AnalysisResult {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  // Foreign key to SubmittedUrl
  @Column({ name: 'url_id', type: 'uuid' })
  urlId!: string;

  @ManyToOne(() => SubmittedUrl, (url) => url.analysisResults, {
    onDelete: 'CASCADE',
    nullable: false,
  })
  @JoinColumn({ name: 'url_id' })
  url?: SubmittedUrl;

  @Column({
    name: 'analysis_date',
    type: 'timestamp with time zone',
    nullable: true,
    default: () => 'now()',
  })
  analysisDate!: Date | null;

  @Column({ name: 'is_phishing', type: 'boolean' })
  isPhishing!: boolean;

  // 0-100, enforced by a CHECK constraint as well
  @Column({ name: 'risk_score', type: 'integer' })
  riskScore!: number;

  @Column({ name: 'confidence_level', type: 'text' })
  confidenceLevel!: ConfidenceLevel;

  @Column({ name: 'virustotal_result', type: 'jsonb', nullable: true })
  virustotalResult!: AnalyzerPayload | null;

  @Column({ name: 'heuristic_result', type: 'jsonb', nullable: true })
  heuristicResult!: AnalyzerPayload | null;

  @Column({ name: 'analysis_duration_ms', type: 'integer', nullable: true })
  analysisDurationMs!: number | null;

  @Column({ name: 'sources_checked', type: 'text', array: true, nullable: true })
  sourcesChecked!: string[] | null;

  @Column({ name: 'error_log', type: 'text', nullable: true })
  errorLog!: string | null;

  @CreateDateColumn({ name: 'created_at', type: 'timestamp with time zone' })
  createdAt!: Date;
}
