import express from 'express';
import helmet from 'helmet';
import healthRouter from './routes/health.js';
import conversionRouter from './routes/conversion.js';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';
import { createLogger } from './services/logger/index.js';
import { generateRequestId } from './services/logger/correlation.js';

const logger = createLogger('http');

const app = express();

// Security headers
app.use(helmet());
app.use(express.json());

// Request logging middleware
app.use((req, res, next) => {
  const requestId = generateRequestId();
  res.setHeader('X-Request-Id', requestId);
  logger.info({ requestId, method: req.method, url: req.url }, 'request');
  next();
});

app.use(healthRouter);
app.use('/api', conversionRouter);

app.use(notFoundHandler);
app.use(errorHandler);

export default app;
