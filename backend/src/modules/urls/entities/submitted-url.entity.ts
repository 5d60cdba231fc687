import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
  OneToMany,
} from 'typeorm';
import { AnalysisResult } from '../../analysis/entities/analysis-result.entity';

/**
 * A URL submitted for phishing analysis.
 * `url` holds the normalized form and is the uniqueness key; it never changes
 * after insert.
 */
@Entity('urls')
@Index('idx_urls_domain', ['domain'])
@Index('idx_urls_submitted_at', ['submittedAt'])
export class SubmittedUrl {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'text', unique: true, update: false })
  url!: string;

  @Column({ type: 'text' })
  domain!: string;

  @Column({
    name: 'submitted_at',
    type: 'timestamp with time zone',
    nullable: true,
    default: () => 'now()',
    update: false,
  })
  submittedAt!: Date;

  // Provenance: how the URL entered the system
  @Column({ type: 'text', nullable: true, default: 'manual' })
  source!: string;

  @CreateDateColumn({ name: 'created_at', type: 'timestamp with time zone' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamp with time zone' })
  updatedAt!: Date;

  @Column({ name: 'url_hash', type: 'text', nullable: true, update: false })
  urlHash!: string | null;

  // Not loaded unless requested; rows go away with the URL (ON DELETE CASCADE)
  @OneToMany(() => AnalysisResult, (result) => result.url)
  analysisResults?: AnalysisResult[];
}
