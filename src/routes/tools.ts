import { Router, Request, Response } from 'express';
import { CallerId, getToolExecutor } from '../services/tool-executor';
import { getToolRegistry, isPlainObject } from '../services/tool-registry';

export const toolsRouter = Router();

// Numeric ids must be exact; 64-bit chat ids have to be sent as strings
function isCallerId(value: unknown): value is CallerId {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value);
  }
  return value === undefined || value === null || typeof value === 'string';
}

/**
 * GET /api/tools
 * Tool catalog in function-calling format
 */
toolsRouter.get('/', (req: Request, res: Response) => {
  res.json({ tools: getToolRegistry().getAllTools() });
});

/**
 * POST /api/tools/execute
 * Execute one tool call on behalf of a chat user.
 * Tool-level failures are part of the result; only malformed requests get a non-200 status.
 */
toolsRouter.post('/execute', async (req: Request, res: Response) => {
  try {
    const body: unknown = req.body;
    if (!isPlainObject(body)) {
      res.status(400).json({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Request body must be a JSON object'
        }
      });
      return;
    }

    const { name, arguments: args, callerId } = body;

    if (typeof name !== 'string' || name.trim().length === 0) {
      res.status(400).json({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Field "name" is required'
        }
      });
      return;
    }

    if (args !== undefined && args !== null && !isPlainObject(args)) {
      res.status(400).json({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Field "arguments" must be an object'
        }
      });
      return;
    }

    if (!isCallerId(callerId)) {
      res.status(400).json({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Field "callerId" must be a string or a safe integer'
        }
      });
      return;
    }

    const result = await getToolExecutor().execute(
      { name: name.trim(), arguments: isPlainObject(args) ? args : {} },
      { callerId }
    );
    res.json({ result });
  } catch (error) {
    console.error('Error executing tool:', error);
    res.status(500).json({
      error: {
        code: 'INTERNAL_ERROR',
        message: 'Failed to execute tool'
      }
    });
  }
});
