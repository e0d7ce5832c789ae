// src/simulation/main.ts

import { logger } from '../logger';
import { runDaySimulation } from './runDaySimulation';

runDaySimulation()
    .then(summary => {
        process.exitCode = summary.allInvariantsHold ? 0 : 1;
    })
    .catch(err => {
        logger.fatal({ err }, 'Simulation failed');
        process.exitCode = 1;
    });
