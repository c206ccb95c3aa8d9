/**
 * columnar-schema entry point - loads the table catalog
 * Logs a summary of every table; given a table name, prints its serialized schema
 */
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { CatalogService } from './catalog/catalog.service';
import { getLogLevels } from './common/logging.utils';

async function bootstrap() {
  const logger = new Logger('columnar-schema');
  
  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception:', error);
    process.exit(1);
  });
  
  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection, reason:', reason);
    process.exit(1);
  });
  
  try {
    const app = await NestFactory.createApplicationContext(AppModule, {
      logger: getLogLevels(process.env.LOG_LEVEL),
    });

    const catalog = app.get(CatalogService);
    for (const tableName of catalog.listTables()) {
      const schema = catalog.getTable(tableName);
      logger.log(`${tableName}: ${schema.columns().length} columns, highest field id ${schema.highestFieldId}`);
    }

    const tableName = process.argv[2];
    if (tableName) {
      process.stdout.write(`${catalog.exportTable(tableName)}\n`);
    }

    await app.close();
  } catch (error) {
    logger.error('Failed to load catalog');
    console.error(error); // Log full error to console before exit
    process.exit(1);
  }
}

void bootstrap();
