import { Request, Response } from 'express';

/**
 * Handle 404 - Route not found
 */
export const notFound = (req: Request, res: Response): void => {
  res.status(404).json({
    success: false,
    error: 'Route not found',
    details: { method: req.method, path: req.originalUrl },
    timestamp: new Date().toISOString(),
  });
};

export default notFound;
