import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import morgan from 'morgan';
import { AppConfig } from './config';
import { DocumentFilter, DocumentStore } from './database';
import {
  AppError,
  createErrorResponse,
  errorMessage,
  InternalError,
  StoreUnavailableError,
  ValidationError
} from './errors';
import {
  describeSchemas,
  leadSchema,
  listProductsQuerySchema,
  parsePayload,
  productSchema
} from './schema';

export interface AppDependencies {
  // null when no database is configured; store-backed routes then fail with 500
  store: DocumentStore | null;
  config: AppConfig;
}

export interface DiagnosticReport {
  backend: string;
  database: string;
  database_url: string | null;
  database_name: string | null;
  connection_status: string;
  collections: string[];
}

const DIAGNOSTIC_MESSAGE_LENGTH = 50;

function isJsonParseError(error: unknown): boolean {
  return (
    error instanceof SyntaxError &&
    'type' in error &&
    error.type === 'entity.parse.failed'
  );
}

export function createApp({ store, config }: AppDependencies) {
  const app = express();

  const requireStore = (): DocumentStore => {
    if (store === null) {
      throw new StoreUnavailableError('Database is not configured (DATABASE_URL is not set)');
    }
    return store;
  };

  // Middleware setup
  // '*' reflects the request origin so credentialed requests are accepted from anywhere
  app.use(cors({
    origin: config.corsOrigin === '*' ? true : config.corsOrigin,
    credentials: true
  }));

  app.use(express.json({ limit: '5mb' }));

  if (config.nodeEnv !== 'test') {
    app.use(morgan(':method :url :status :res[content-length] - :response-time ms'));
  }

  // ===== SERVICE ENDPOINTS =====

  app.get('/', (_req, res) => {
    res.json({ message: 'Spice Catalog Backend Running' });
  });

  /*
    Entity schemas endpoint
    Returns the JSON Schema of every entity, for database viewers
  */
  app.get('/schema', (_req, res, next) => {
    try {
      res.json(describeSchemas());
    } catch (error) {
      next(new InternalError(`Schema generation failed: ${errorMessage(error)}`, { cause: error }));
    }
  });

  /*
    Database diagnostic endpoint
    Reports store availability and configuration presence; always answers 200
  */
  app.get('/test', async (_req, res) => {
    const report: DiagnosticReport = {
      backend: '✅ Running',
      database: '❌ Not Available',
      database_url: null,
      database_name: null,
      connection_status: 'Not Connected',
      collections: []
    };

    try {
      if (store !== null) {
        report.database = '✅ Available';
        report.connection_status = 'Connected';

        try {
          const collections = await store.listCollectionNames();
          report.collections = collections.slice(0, 10);
          report.database = '✅ Connected & Working';
        } catch (error) {
          report.database = `⚠️  Connected but Error: ${errorMessage(error).slice(0, DIAGNOSTIC_MESSAGE_LENGTH)}`;
        }
      } else {
        report.database = '⚠️  Available but not initialized';
      }
    } catch (error) {
      report.database = `❌ Error: ${errorMessage(error).slice(0, DIAGNOSTIC_MESSAGE_LENGTH)}`;
    }

    report.database_url = config.databaseUrl ? '✅ Set' : '❌ Not Set';
    report.database_name = config.databaseName ? '✅ Set' : '❌ Not Set';

    res.json(report);
  });

  // ===== PRODUCT ENDPOINTS =====

  /*
    List products endpoint
    Optional category / featured equality filters, limit defaults to 50
  */
  app.get('/products', async (req, res, next) => {
    try {
      const query = parsePayload(listProductsQuerySchema, req.query);

      const filter: DocumentFilter = {};
      if (query.category) {
        filter.category = query.category;
      }
      if (query.featured !== undefined) {
        filter.featured = query.featured;
      }

      const products = await requireStore().listDocuments('product', filter, query.limit);
      res.json(products);
    } catch (error) {
      next(error);
    }
  });

  /*
    Create product endpoint
    Validates the payload and stores it; answers with the new identifier
  */
  app.post('/products', async (req, res, next) => {
    try {
      const product = parsePayload(productSchema, req.body);
      const id = await requireStore().createDocument('product', product);
      res.status(201).json({ id });
    } catch (error) {
      next(error);
    }
  });

  // ===== LEAD ENDPOINTS =====

  app.post('/lead', async (req, res, next) => {
    try {
      const lead = parsePayload(leadSchema, req.body);
      const id = await requireStore().createDocument('lead', lead);
      res.status(201).json({ id, message: 'Thanks for reaching out!' });
    } catch (error) {
      next(error);
    }
  });

  // ===== FALLBACKS =====

  app.use((req, res) => {
    res.status(404).json(createErrorResponse(`Route ${req.method} ${req.path} not found`, null, 'NOT_FOUND'));
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const appError = isJsonParseError(error)
      ? new ValidationError([{ field: 'body', message: 'Malformed JSON body' }])
      : error;

    if (appError instanceof AppError) {
      if (appError.status >= 500) {
        console.error(`${appError.name}:`, appError.message, appError.cause ?? '');
      }
      const message = appError instanceof ValidationError ? 'Invalid input data' : appError.message;
      res.status(appError.status).json(createErrorResponse(message, appError.details, appError.code));
      return;
    }

    console.error('Unhandled error:', appError);
    res.status(500).json(createErrorResponse('Internal server error', null, 'INTERNAL_SERVER_ERROR'));
  });

  return app;
}
