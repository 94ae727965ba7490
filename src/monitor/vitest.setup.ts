import { setLogOutput } from '../logging/subsystem.js';

// Keep sampler warnings out of the test reporter
setLogOutput({ kind: 'discard' });
