/**
 * (c) settlement-dump-decoder - Card settlement dump decoding
 * October 19, 2026
 *
 * A TypeScript based decoder for ISO 8583 style transaction dumps
 */
import express, { Request, Response, NextFunction } from 'express';
import nocache from 'nocache';

import { readConfig } from "./business/config";
import { getLogger } from "./business/logger";
import { createDecodeRouter } from "./routes/decode";
import { createRegistryRouter } from "./routes/registry";
import { errorMessage } from "./business/util";

const config = readConfig();
const logger = getLogger('app', config.verbose);

const app: express.Application = express();

app.use(nocache());

// add CORS headers for the upload front end
app.use(function (req, res, next) {
    res.header("Access-Control-Allow-Credentials", "true");
    res.header("Access-Control-Allow-Origin", req.headers.origin ?? "*");
    res.header("Access-Control-Allow-Headers", "Origin, X-Requested-With, Content-Type, Accept, Authorization");
    res.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    next();
});

app.get('/', (req, res) => res.send('Dump decoder REST interface running.'));

app.use("/decode", createDecodeRouter(config.engine, config.bodyLimit, config.verbose));
app.use("/", createRegistryRouter(config.engine.mtiMeanings));

app.use(function (err: unknown, req: Request, res: Response, next: NextFunction) {
    logger.error(`${req.method} ${req.path}: ${errorMessage(err)}`);
    if (res.headersSent) return next(err);
    res.status(500).json({ status: errorMessage(err) });
});

if (config.engine.specifications) {
    logger.info(`loaded ${config.engine.specifications.size} field specifications`);
}

app.listen(config.port, () => logger.success(`Dump decoder REST listening on port ${config.port}.`));
