import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";

import { AdminsModule } from "./admins/admins.module";
import { ApprovalsModule } from "./approvals/approvals.module";
import { ConfigController } from "./config/config.controller";
import { validateLedgerEnv } from "./config/ledger.config";
import { HealthController } from "./health.controller";
import { LedgerModule } from "./ledger/ledger.module";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ["../../.env", ".env"],
      validate: validateLedgerEnv,
    }),
    LedgerModule,
    AdminsModule,
    ApprovalsModule,
  ],
  controllers: [HealthController, ConfigController],
})
export class AppModule {}
