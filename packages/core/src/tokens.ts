export const TYPES = {
  Config: Symbol.for('Config'),
  ILogger: Symbol.for('ILogger'),
  JiraHttp: Symbol.for('JiraHttp'),
  ITicketClient: Symbol.for('ITicketClient'),
  IHierarchyResolver: Symbol.for('IHierarchyResolver'),
  ITicketWriter: Symbol.for('ITicketWriter'),
  IExportService: Symbol.for('IExportService'),
};
