import * as workerpool from 'workerpool';

// Child that answers every batch with something other than a list of results
workerpool.worker({ runJobs: () => 'not a list of results' });
