import { setLogLevel } from '../logging/logger.js';

setLogLevel('silent');
