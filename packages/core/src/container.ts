import { Container } from 'inversify';
import { type ITicketClient, JiraTicketClient } from './client';
import { type IExportService, ExportService } from './exporter';
import { createHttpClient, type JiraHttp } from './http';
import { type ILogger, ConsoleLogger } from './logger';
import { type IHierarchyResolver, HierarchyResolver } from './resolver';
import { TYPES } from './tokens';
import type { ExporterConfig } from './types';
import { type ITicketWriter, TicketWriter } from './writer';

export { TYPES } from './tokens';

export interface ContainerOverrides {
  logger?: ILogger;
  http?: JiraHttp;
  client?: ITicketClient;
}

export function createContainer(config: ExporterConfig, overrides: ContainerOverrides = {}): Container {
  const container = new Container();

  container.bind<ExporterConfig>(TYPES.Config).toConstantValue(config);
  container.bind<ILogger>(TYPES.ILogger).toConstantValue(overrides.logger ?? new ConsoleLogger());
  // Created lazily so a container can be built without touching the network stack
  container.bind<JiraHttp>(TYPES.JiraHttp).toDynamicValue(() => overrides.http ?? createHttpClient(config)).inSingletonScope();

  if (overrides.client) {
    container.bind<ITicketClient>(TYPES.ITicketClient).toConstantValue(overrides.client);
  } else {
    container.bind<ITicketClient>(TYPES.ITicketClient).to(JiraTicketClient).inSingletonScope();
  }
  container.bind<IHierarchyResolver>(TYPES.IHierarchyResolver).to(HierarchyResolver).inSingletonScope();
  container.bind<ITicketWriter>(TYPES.ITicketWriter).to(TicketWriter).inSingletonScope();
  container.bind<IExportService>(TYPES.IExportService).to(ExportService).inSingletonScope();

  return container;
}
