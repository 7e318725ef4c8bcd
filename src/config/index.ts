import { config } from 'dotenv';
import { PlayerConfig } from '../types/music';
import { loadPlayerConfig } from './schema';

// Load environment variables
config();

export const playerConfig: PlayerConfig = loadPlayerConfig();

export { loadPlayerConfig };
