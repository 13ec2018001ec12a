import 'dotenv/config';

// Level set loaded at start-up, relative to the working directory
export const LEVELS_FILE = process.env.LEVELS_FILE || 'levels/default.json';

// Print one [Game] line per processed key
export const TRACE = process.env.TRACE === '1';
