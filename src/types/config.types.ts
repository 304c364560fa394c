export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent'

export interface Config {
  // System Config
  port: number
  logLevel: LogLevel
  closeGraceDelay: number
  // Homework API Config
  practicumToken: string
  practicumEndpoint: string
  // Telegram Config
  telegramToken: string
  telegramChatId: string
  telegramApiUrl: string
  // Poller Config
  pollerEnabled: boolean
  retryPeriodSeconds: number
  requestTimeoutMs: number
}

/** Environment keys that must be present before the poller can start */
export type RequiredCredential =
  | 'practicumToken'
  | 'telegramToken'
  | 'telegramChatId'

declare module 'fastify' {
  interface FastifyInstance {
    config: Config
  }
}
