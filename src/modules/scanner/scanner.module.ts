import { Module } from '@nestjs/common';
import { readStringEnv, resolveScanAdapter } from '../../config/env';
import { DetectionsModule } from '../detections/detections.module';
import { ADAPTER_GATEWAY, AdapterGateway } from './adapter/adapter-gateway';
import { BluetoothctlGateway } from './adapter/bluetoothctl.gateway';
import { SimulatedAdapterGateway } from './adapter/simulated.gateway';
import { ScanScheduler } from './scan-scheduler.service';

@Module({
  imports: [DetectionsModule],
  providers: [
    {
      provide: ADAPTER_GATEWAY,
      useFactory: (): AdapterGateway => {
        if (resolveScanAdapter() === 'simulated') {
          return new SimulatedAdapterGateway();
        }
        return new BluetoothctlGateway({
          cliPath: readStringEnv('BLUETOOTHCTL_PATH', 'bluetoothctl')
        });
      }
    },
    ScanScheduler
  ],
  exports: [ScanScheduler]
})
export class ScannerModule {}
