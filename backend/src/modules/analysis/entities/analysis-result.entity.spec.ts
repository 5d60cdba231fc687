import { getMetadataArgsStorage } from 'typeorm';
import { AnalysisResult, CONFIDENCE_LEVELS } from './analysis-result.entity';
import { SubmittedUrl } from '../../urls/entities/submitted-url.entity';

describe('AnalysisResult Entity', () => {
  const storage = getMetadataArgsStorage();

  it('should be owned by its URL and deleted with it', () => {
    const relation = storage.relations.find(
      (r) => r.target === AnalysisResult && r.propertyName === 'url',
    );

    expect(relation).toBeDefined();
    expect(relation?.relationType).toBe('many-to-one');
    expect(relation?.options.onDelete).toBe('CASCADE');
    expect(relation?.options.nullable).toBe(false);
  });

  it('should join on the url_id column', () => {
    const joinColumn = storage.joinColumns.find(
      (c) => c.target === AnalysisResult && c.propertyName === 'url',
    );

    expect(joinColumn?.name).toBe('url_id');
  });

  it('should map to the analysis_results table', () => {
    const table = storage.tables.find((t) => t.target === AnalysisResult);

    expect(table?.name).toBe('analysis_results');
  });

  it('should expose the inverse side on SubmittedUrl', () => {
    const relation = storage.relations.find(
      (r) => r.target === SubmittedUrl && r.propertyName === 'analysisResults',
    );

    expect(relation?.relationType).toBe('one-to-many');
  });

  it('should keep sources_checked as a text array', () => {
    const column = storage.columns.find(
      (c) => c.target === AnalysisResult && c.propertyName === 'sourcesChecked',
    );

    expect(column?.options.name).toBe('sources_checked');
    expect(column?.options.array).toBe(true);
  });

  it('should list confidence levels from most to least certain', () => {
    expect(CONFIDENCE_LEVELS).toEqual(['high', 'medium', 'low']);
  });
});
