// src/api/controllers/check.controller.ts
import { Request, Response, NextFunction } from 'express';
import { PhishyCheckService } from '../../analysis/phishy-check-service';
import { RecentPhishyLog } from '../../services/recent-phishy-log';
import { toCheckResponse, toRecentEntry, toRecentEntryBody } from '../../presentation/api-response';

interface CheckRequestBody {
  token_address?: unknown;
  bonding_curve?: unknown;
}

export class CheckController {
  constructor(
    private readonly checkService: PhishyCheckService,
    private readonly recentLog: RecentPhishyLog
  ) {}

  checkToken = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const abortController = new AbortController();
    // Client went away before the answer was written
    res.on('close', () => {
      if (!res.writableFinished) abortController.abort();
    });

    const body: CheckRequestBody = req.body ?? {};

    try {
      const result = await this.checkService.checkToken({
        tokenAddress: body.token_address,
        bondingCurve: body.bonding_curve,
        signal: abortController.signal,
      });

      const response = toCheckResponse(result);
      if (response.phishy) {
        await this.recentLog.append(toRecentEntry(result));
      }

      res.json(response);
    } catch (error) {
      next(error);
    }
  };

  getRecentPhishy = (req: Request, res: Response): void => {
    const tokens = this.recentLog.list().map(toRecentEntryBody);
    res.json({
      success: true,
      tokens,
      count: tokens.length,
    });
  };
}
