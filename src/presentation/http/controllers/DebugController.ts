import { Request, Response } from 'express';
import { GetClientsDebugInfoUseCase } from '../../../application/use-cases/GetClientsDebugInfoUseCase';

/**
 * Controller for handling debug-related HTTP requests
 */
export class DebugController {
  constructor(
    private getClientsDebugInfoUseCase: GetClientsDebugInfoUseCase
  ) { }

  /**
   * Handles GET /debug/clients
   * Returns pool mode, per-client workload and cache occupancy
   */
  getClientsDebugInfo(_req: Request, res: Response): void {
    res.json(this.getClientsDebugInfoUseCase.execute());
  }
}
