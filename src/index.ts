import 'dotenv/config';
import express from 'express';
import { loadEnvConfig, validateRequiredEnvVars } from './config/env';
import { closePool } from './lib/db';
import { healthRouter } from './routes/health';
import { toolsRouter } from './routes/tools';

// Validate environment variables before starting
validateRequiredEnvVars();

const config = loadEnvConfig();
const app = express();

// Middleware
app.use(express.json());

// Routes
app.use('/api/health', healthRouter);
app.use('/api/tools', toolsRouter);

// Error handling middleware
app.use((err: Error, req: express.Request, res: express.Response, _next: express.NextFunction) => {
  // Unparseable JSON bodies from express.json()
  if (err instanceof SyntaxError) {
    res.status(400).json({
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Request body is not valid JSON'
      }
    });
    return;
  }

  console.error('Unhandled error:', err);
  res.status(500).json({
    error: {
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred'
    }
  });
});

// Start server
function start(): void {
  const server = app.listen(config.PORT, () => {
    console.log(`Meeting assistant tools API running on port ${config.PORT}`);
  });

  // Graceful shutdown handler
  const shutdown = () => {
    console.log('Shutting down gracefully...');
    server.close(() => {
      closePool()
        .then(() => process.exit(0))
        .catch((error) => {
          console.error('Failed to close database pool:', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

start();

export { app };
