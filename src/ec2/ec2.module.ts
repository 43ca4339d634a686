import { Module } from '@nestjs/common';
import { EC2Service } from './ec2.service';

@Module({
  providers: [EC2Service],
  exports: [EC2Service],
})
export class EC2Module {}
