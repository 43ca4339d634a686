import { ConsoleLogger, LogLevel } from '@nestjs/common';

// stdout은 보고서 전용, 진단 로그는 모두 stderr로 보낸다
export class StderrLogger extends ConsoleLogger {
  protected printMessages(
    messages: unknown[],
    context = '',
    logLevel: LogLevel = 'log',
  ): void {
    super.printMessages(messages, context, logLevel, 'stderr');
  }
}
