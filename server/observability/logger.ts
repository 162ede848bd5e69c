import winston from 'winston';
import WinstonCloudWatch from 'winston-cloudwatch';

interface CloudWatchConfig {
  logGroupName: string;
  logStreamName: string;
  awsRegion: string;
  jsonMessage: boolean;
  awsOptions: {
    credentials: {
      accessKeyId: string;
      secretAccessKey: string;
    };
  };
}

const transports: winston.transport[] = [
  new winston.transports.Console({
    silent: process.env.NODE_ENV === 'test' || process.env.TEST_MODE === 'true',
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
        return `${timestamp} ${level}: ${message}${extra}`;
      })
    ),
  }),
];

const { AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY } = process.env;

if (AWS_ACCESS_KEY_ID && AWS_SECRET_ACCESS_KEY) {
  const cloudWatchConfig: CloudWatchConfig = {
    logGroupName: process.env.LOG_GROUP_NAME || 'workspace-oauth-broker',
    logStreamName: 'oauth-broker',
    awsRegion: process.env.AWS_REGION || 'us-east-1',
    jsonMessage: true,
    awsOptions: {
      credentials: {
        accessKeyId: AWS_ACCESS_KEY_ID,
        secretAccessKey: AWS_SECRET_ACCESS_KEY,
      },
    },
  };
  transports.push(new WinstonCloudWatch(cloudWatchConfig));
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  transports,
});
