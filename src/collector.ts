import type { OutcomeChannel } from './channel.js';
import { errorMessage, SerializationError } from './errors.js';
import { prettyPrintJson } from './format.js';
import type { Logger } from './logger.js';
import type { ErrorOutcome, SuccessOutcome } from './types.js';

export interface CollectorOptions {
  burst: number;
  verbose: boolean;
  logger: Logger;
}

// Each response body is either read (verbose) or cancelled, never both.
async function readBody(index: number, response: Response, logger: Logger): Promise<string | undefined> {
  try {
    return await response.text();
  } catch (error) {
    logger.warn(`request #${index} >> could not read response body: ${errorMessage(error)}`);
    return undefined;
  }
}

async function discardBody(index: number, response: Response, logger: Logger): Promise<void> {
  if (!response.body || response.bodyUsed) return;
  try {
    await response.body.cancel();
  } catch (error) {
    logger.warn(`request #${index} >> could not release response body: ${errorMessage(error)}`);
  }
}

function formatBody(index: number, body: string, logger: Logger): string {
  try {
    return prettyPrintJson(body);
  } catch (error) {
    if (!(error instanceof SerializationError)) throw error;
    logger.warn(`request #${index} >> ${error.message}`);
    return body;
  }
}

/**
 * Drains a burst's success channel until the dispatcher closes it.
 * Resolves with the number of outcomes consumed.
 */
export async function collectResults(
  channel: OutcomeChannel<SuccessOutcome>,
  options: CollectorOptions
): Promise<number> {
  const { burst, verbose, logger } = options;
  let count = 0;

  for await (const outcome of channel) {
    count++;
    if (count === 1) {
      logger.info(`buffer # ${burst}`);
    }
    logger.info(`request #${outcome.index} >> http status response ${outcome.response.status}`);

    if (!verbose) {
      await discardBody(outcome.index, outcome.response, logger);
      continue;
    }
    const body = await readBody(outcome.index, outcome.response, logger);
    if (body) {
      logger.info(`request #${outcome.index} >> response: ${formatBody(outcome.index, body, logger)}`);
    }
  }

  return count;
}

/**
 * Drains a burst's error channel until the dispatcher closes it.
 * Resolves with the number of outcomes consumed.
 */
export async function collectErrors(
  channel: OutcomeChannel<ErrorOutcome>,
  options: CollectorOptions
): Promise<number> {
  const { burst, verbose, logger } = options;
  let count = 0;

  for await (const outcome of channel) {
    count++;
    if (count === 1) {
      logger.info(`buffer # ${burst}`);
    }

    if (outcome.kind === 'transport') {
      logger.error(`error on request #${outcome.index} >> ${outcome.error.message}`);
      continue;
    }

    logger.error(`error on request #${outcome.index} >> http status code: ${outcome.response.status}`);
    if (!verbose) {
      await discardBody(outcome.index, outcome.response, logger);
      continue;
    }
    const body = await readBody(outcome.index, outcome.response, logger);
    if (body) {
      logger.info(`request #${outcome.index} >> response: ${body}`);
    }
  }

  return count;
}
