import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import configuration from './config/config.env';
import { CompletionReportModule } from './completion-report/completion-report.module';
import { CliOptionsDto } from './cli/cli-options.dto';

@Module({})
export class AppModule {
  /** Los flags de la CLI pisan a las variables de entorno */
  static forRoot(options: CliOptionsDto): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          load: [
            () => {
              const env = configuration();
              return {
                moodle: { ...env.moodle, baseUrl: options.url, token: options.token },
                report: { ...env.report, threads: options.threads },
              };
            },
          ],
        }),
        CompletionReportModule,
      ],
    };
  }
}
