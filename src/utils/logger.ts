import pino from 'pino';
import {config} from '../config';


function buildTransport(): pino.TransportSingleOptions | undefined {
  if (config.logger.format === 'terminal') {
    return {
      target: 'pino-pretty',
      options: {
        colorize: !config.logger.file,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: config.logger.file || 1
      }
    };
  }
  if (config.logger.file) {
    return {
      target: 'pino/file',
      options: {destination: config.logger.file, mkdir: true}
    };
  }
  return undefined;
}


export const logger = pino({
  name: config.common.appName,
  level: config.logger.level,
  transport: buildTransport()
});
