import { config } from 'dotenv';
import { AppConfig } from '../types/music';
import { loadAppConfig } from './schema';

// Load environment variables before anything reads them
config();

export const appConfig: AppConfig = loadAppConfig();
