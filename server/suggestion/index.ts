export * from './styles';
export * from './querySuggestion';
