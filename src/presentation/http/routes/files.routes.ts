import { Router } from 'express';
import { FileController } from '../controllers/FileController';
import { DebugController } from '../controllers/DebugController';

/**
 * Creates and configures file routes.
 * express answers HEAD through the GET handlers.
 */
export function createFileRoutes(
  fileController: FileController,
  debugController: DebugController
): Router {
  const router = Router();

  // Stream endpoints; the trailing name only makes URLs friendlier to players
  router.get('/files/:fileId/stream', (req, res) => fileController.stream(req, res));
  router.get('/files/:fileId/stream/:fileName', (req, res) => fileController.stream(req, res));

  // Descriptor endpoint
  router.get('/files/:fileId', (req, res) => fileController.getInfo(req, res));

  // Debug endpoints
  router.get('/debug/clients', (req, res) => debugController.getClientsDebugInfo(req, res));

  return router;
}
