import express from 'express';
import cors from 'cors';
import { createRentalRouter } from './routes (APIs)/rentals';
import { RentalService } from './services/rentalService';

export function createApp(service: RentalService) {
  const app = express();

  // Middlewares
  app.use(cors());
  app.use(express.json());

  // Routes
  app.use('/api', createRentalRouter(service));

  // Healthcheck
  app.get('/health', (_req, res) => res.json({ ok: true }));

  return app;
}
