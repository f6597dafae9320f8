import express, { Application, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { createAuthRoutes } from './routes/auth.routes';
import { createStudentsRoutes } from './routes/students.routes';
import { createAssignmentsRoutes } from './routes/assignments.routes';
import { AuthController } from './controllers/auth.controller';
import { StudentsController } from './controllers/students.controller';
import { AssignmentsController } from './controllers/assignments.controller';
import { createAuthenticate } from './middleware/auth.middleware';
import { createAuthRateLimiter, createGlobalRateLimiter } from './middleware/rate.middleware';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import { AuthService } from './services/auth.service';
import { CredentialService } from './services/credential.service';
import { TokenService } from './services/token.service';
import { StudentsService } from './services/students.service';
import { AssignmentsService } from './services/assignments.service';
import { InMemoryUserStore } from './stores/in-memory-user.store';
import { InMemoryRecordStore } from './stores/in-memory-record.store';
import type { Assignment, Student } from './types/school.types';
import type { AppConfig } from './types/app.types';
import { logger, logRequest } from './utils/logger';

export interface AppServices {
  tokenService: TokenService;
  authService: AuthService;
  studentsService: StudentsService;
  assignmentsService: AssignmentsService;
}

/**
 * Wire services onto in-memory stores.
 *
 * @throws SigningKeyInvalidError if the configured signing key is unusable
 */
export function createServices(appConfig: AppConfig): AppServices {
  const tokenService = new TokenService({
    signingKey: appConfig.auth.jwtSecret,
    ttlSeconds: appConfig.auth.tokenTtlSeconds,
  });

  return {
    tokenService,
    authService: new AuthService(new InMemoryUserStore(), new CredentialService(), tokenService),
    studentsService: new StudentsService(new InMemoryRecordStore<Student>()),
    assignmentsService: new AssignmentsService(new InMemoryRecordStore<Assignment>()),
  };
}

/**
 * Create and configure Express application
 */
export function createApp(services: AppServices, appConfig: AppConfig): Application {
  const app = express();

  // ============================================
  // Security Middleware
  // ============================================

  app.use(
    helmet({
      contentSecurityPolicy: false, // Disable CSP for API
      crossOriginEmbedderPolicy: false,
    })
  );

  app.use(createGlobalRateLimiter(appConfig.rateLimit));

  app.use(
    cors({
      origin: '*',
      methods: ['GET', 'POST', 'PUT', 'DELETE'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Authorization'],
    })
  );

  // ============================================
  // Body Parsing Middleware
  // ============================================

  app.use(express.json({ limit: appConfig.jsonBodyLimit }));

  // ============================================
  // Request Logging Middleware
  // ============================================

  app.use((req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();

    res.on('finish', () => {
      logRequest(req.method, req.originalUrl, res.statusCode, Date.now() - startTime);
    });

    next();
  });

  // ============================================
  // Health Check
  // ============================================

  app.get('/', (req: Request, res: Response) => {
    res.status(200).json({
      service: 'Student Assignment Tracker',
      version: '1.0.0',
      status: 'running',
      endpoints: {
        health: 'GET /health',
        register: 'POST /auth/register',
        login: 'POST /auth/login',
        students: '/students',
        assignments: '/assignments',
      },
    });
  });

  app.get('/health', (req: Request, res: Response) => {
    res.status(200).json({ status: 'ok', uptime: process.uptime() });
  });

  // ============================================
  // API Routes
  // ============================================

  const authenticate = createAuthenticate(services.tokenService);

  app.use(
    '/auth',
    createAuthRoutes(
      new AuthController(services.authService),
      authenticate,
      createAuthRateLimiter(appConfig.rateLimit)
    )
  );
  app.use(
    '/students',
    createStudentsRoutes(
      new StudentsController(services.studentsService, services.assignmentsService),
      authenticate
    )
  );
  app.use(
    '/assignments',
    createAssignmentsRoutes(new AssignmentsController(services.assignmentsService), authenticate)
  );

  // ============================================
  // Error Handling
  // ============================================

  // 404 handler (must be after all routes)
  app.use(notFoundHandler);

  // Global error handler (must be last)
  app.use(errorHandler);

  logger.info('Express application configured successfully');

  return app;
}
