import { utilities as nestWinstonModuleUtilities } from 'nest-winston';
import { format, LoggerOptions, transports } from 'winston';

export function createLoggerOptions(formatType: string, level = 'info', silent = false): LoggerOptions {
  const isJson = formatType === 'json';

  return {
    level,
    silent,
    transports: [
      new transports.Console({
        format: isJson
          ? format.combine(format.timestamp(), format.json())
          : format.combine(
              format.timestamp(),
              nestWinstonModuleUtilities.format.nestLike('RetailLedger', {
                prettyPrint: true,
              }),
            ),
      }),
    ],
  };
}
