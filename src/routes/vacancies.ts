import { Router, Request, Response } from 'express';
import type { DBManager } from '../db/manager';

export function createVacancyRouter(manager: DBManager): Router {
  const router = Router();

  // GET /api/companies - companies with their vacancy counts
  router.get('/companies', (_req: Request, res: Response) => {
    try {
      const companies = manager.getCompaniesAndVacanciesCount();
      res.json({ success: true, companies });
    } catch (error) {
      console.error('[API] Companies error:', error);
      res.status(500).json({ success: false, error: 'Failed to list companies' });
    }
  });

  // GET /api/vacancies/avg-salary - must come before the other /vacancies/* routes
  router.get('/vacancies/avg-salary', (_req: Request, res: Response) => {
    try {
      const avgSalary = manager.getAvgSalary();
      res.json({ success: true, avgSalary });
    } catch (error) {
      console.error('[API] Average salary error:', error);
      res.status(500).json({ success: false, error: 'Failed to get average salary' });
    }
  });

  // GET /api/vacancies/above-average - midpoint strictly above the average
  router.get('/vacancies/above-average', (_req: Request, res: Response) => {
    try {
      const vacancies = manager.getVacanciesWithHigherSalary();
      res.json({ success: true, vacancies });
    } catch (error) {
      console.error('[API] Above-average error:', error);
      res.status(500).json({ success: false, error: 'Failed to list vacancies' });
    }
  });

  // GET /api/vacancies/search?keyword= - case-insensitive name search
  router.get('/vacancies/search', (req: Request, res: Response) => {
    try {
      const keyword = typeof req.query.keyword === 'string' ? req.query.keyword.trim() : '';
      if (!keyword) {
        res.status(400).json({ success: false, error: 'keyword is required' });
        return;
      }
      const vacancies = manager.getVacanciesWithKeyword(keyword);
      res.json({ success: true, vacancies });
    } catch (error) {
      console.error('[API] Search error:', error);
      res.status(500).json({ success: false, error: 'Failed to search vacancies' });
    }
  });

  // GET /api/vacancies - every vacancy with its company name
  router.get('/vacancies', (_req: Request, res: Response) => {
    try {
      const vacancies = manager.getAllVacancies();
      res.json({ success: true, vacancies });
    } catch (error) {
      console.error('[API] Vacancies list error:', error);
      res.status(500).json({ success: false, error: 'Failed to list vacancies' });
    }
  });

  return router;
}
