import express from 'express';
import cors from 'cors';
import http from 'http';
import { Server as SocketIOServer } from 'socket.io';
import { config } from './config';
import { logger } from './utils/logger';
import { setJobEventHandler } from './services/job-queue.service';
import { loadSettings } from './services/settings.service';

// Routes
import printerRoutes from './routes/printer.routes';
import printRoutes from './routes/print.routes';
import jobRoutes from './routes/job.routes';
import settingsRoutes from './routes/settings.routes';

const app = express();
const server = http.createServer(app);
const io = new SocketIOServer(server, {
  cors: { origin: '*' },
});

// Middleware
app.use(cors());
app.use(express.json({ limit: '50mb' }));
app.use(express.urlencoded({ extended: true, limit: '50mb' }));

// API Routes
app.use('/api/printers', printerRoutes);
app.use('/api/print', printRoutes);
app.use('/api/jobs', jobRoutes);
app.use('/api/settings', settingsRoutes);

// Health check
app.get('/api/health', (_req, res) => {
  res.json({
    success: true,
    service: 'thermal-label-print',
    version: config.version,
    uptime: process.uptime(),
    timestamp: new Date().toISOString(),
  });
});

// Socket.IO connection
io.on('connection', (socket) => {
  logger.info({ id: socket.id }, 'Client connected');

  socket.on('disconnect', () => {
    logger.info({ id: socket.id }, 'Client disconnected');
  });
});

// Wire job status events to Socket.IO
setJobEventHandler((event) => {
  io.emit(`job:${event.type}`, event);
});

// Initialize services
loadSettings();

// Start server
server.listen(config.port, config.host, () => {
  logger.info({ port: config.port, host: config.host }, 'Label print server started');
});

export { app, server, io };
