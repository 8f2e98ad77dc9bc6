export * from './SearchEngine';
export * from './RelevanceScorer';
export * from './SuggestionCache';
export * from './SuggestionDebouncer';
export * from './filters';
export * from './textAnalysis';
