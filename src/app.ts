import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import activityRoutes from './routes/activity';
import cacheRoutes from './routes/cache';
import rssRoutes from './routes/rss';
import searchRoutes from './routes/search';
import settingsRoutes from './routes/settings';
import logger from './config/logger';

const app = express();

app.use(cors());
app.use(express.json({ limit: '1mb' }));

// Request logging
app.use((req: Request, res: Response, next: NextFunction) => {
  logger.debug(`${req.method} ${req.path}`);
  next();
});

// Routes
app.use('/api/rss', rssRoutes);
app.use('/api/search', searchRoutes);
app.use('/api/cache', cacheRoutes);
app.use('/api/settings', settingsRoutes);
app.use('/api', activityRoutes);

// Health check
app.get('/health', (req: Request, res: Response) => {
  res.json({ status: 'ok' });
});

// 404 handler
app.use((req: Request, res: Response) => {
  res.status(404).json({ error: 'Not found' });
});

// Error handler
app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
  logger.error('Unhandled request error:', err);
  res.status(500).json({ error: 'Internal server error' });
});

export default app;
