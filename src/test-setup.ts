import { Logger } from '@utils/logger';

// Keep test output readable; individual tests spy on Logger when they assert on it
Logger.setLevel('SILENT');
