import { z } from 'zod';
import { isJobProcess } from '../../driver/pool';
import type { JobHandlers } from '../../job';

export const jobs: JobHandlers = {
  sum: (args) => z.array(z.number()).parse(args).reduce((total, value) => total + value, 0),
  echo: (args) => args,
  fail: (args) => {
    throw new Error(`failed with ${JSON.stringify(args)}`);
  },
  nothing: () => undefined,
  inJob: () => isJobProcess(),
};
