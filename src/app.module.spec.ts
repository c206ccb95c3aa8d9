import * as path from 'path';
import { Test } from '@nestjs/testing';
import { AppModule } from './app.module';
import { SerializationModule } from './serialization/serialization.module';
import { CatalogModule } from './catalog/catalog.module';
import { CatalogService } from './catalog/catalog.service';

describe('AppModule', () => {
  const originalPath = process.env.CATALOG_PATH;

  beforeAll(() => {
    process.env.CATALOG_PATH = path.join(__dirname, '..', 'catalog.yaml');
  });

  afterAll(() => {
    if (originalPath === undefined) {
      delete process.env.CATALOG_PATH;
    } else {
      process.env.CATALOG_PATH = originalPath;
    }
  });

  it('should be defined', () => {
    expect(AppModule).toBeDefined();
  });

  it('should import required modules', () => {
    const imports: unknown = Reflect.getMetadata('imports', AppModule);

    expect(Array.isArray(imports)).toBe(true);
    expect(imports).toContain(SerializationModule);
    expect(imports).toContain(CatalogModule);
  });

  it('should create the module with the bundled catalog', async () => {
    const module = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();
    await module.init();

    const catalog = module.get(CatalogService);
    expect(catalog.listTables()).toEqual(['events', 'sessions']);
    expect(catalog.getTable('sessions').identifierFieldNames()).toEqual(['session_id']);

    await module.close();
  });
});
