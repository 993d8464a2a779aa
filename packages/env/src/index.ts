export {
  getDefaultCurrencyCode,
  getDefaultLocale,
  parseEnv,
  type MonetaEnv,
} from './config.js';
