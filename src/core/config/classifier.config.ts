import { registerAs } from '@nestjs/config';

/**
 * Configuração do classificador de intenções
 *
 * Valores numéricos são validados ao montar `ClassifierOptions`
 * (valores inválidos → ConfigurationError).
 */
export const classifierConfig = registerAs('classifier', () => ({
  // Limiares e confianças
  semanticThreshold: parseFloat(process.env.CLASSIFIER_SEMANTIC_THRESHOLD || '0.85'),
  neighbors: parseInt(process.env.CLASSIFIER_NEIGHBORS || '10', 10),
  keywordThreshold: parseFloat(process.env.CLASSIFIER_KEYWORD_THRESHOLD || '0.20'),
  patternConfidence: parseFloat(process.env.CLASSIFIER_PATTERN_CONFIDENCE || '0.90'),
  fallbackConfidence: parseFloat(process.env.CLASSIFIER_FALLBACK_CONFIDENCE || '0.10'),
  semanticBoostWeight: parseFloat(process.env.CLASSIFIER_SEMANTIC_BOOST_WEIGHT || '0.5'),
  cueBoosts: process.env.CLASSIFIER_CUE_BOOSTS !== 'false',
  maxFeatures: parseInt(process.env.CLASSIFIER_MAX_FEATURES || '5000', 10),

  // Arquivos de dados
  trainingDataPath: process.env.CLASSIFIER_TRAINING_DATA || 'data/training.csv',
  evaluationDataPath: process.env.CLASSIFIER_EVALUATION_DATA || 'data/evaluation.csv',
  patternsFile: process.env.CLASSIFIER_PATTERNS_FILE || 'data/namjari-patterns.json',

  trainOnBoot: process.env.CLASSIFIER_TRAIN_ON_BOOT === 'true',
}));

export type ClassifierConfig = ReturnType<typeof classifierConfig>;
