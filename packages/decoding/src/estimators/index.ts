export { LogisticRegression, type LogisticRegressionOptions } from './logistic-regression.js';
export { StandardScaler } from './standard-scaler.js';
