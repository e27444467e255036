import { Module } from '@nestjs/common';
import * as nodemailer from 'nodemailer';
import { MAIL_TRANSPORT_FACTORY, MailTransportFactory } from './dto/mail.dto';
import { MailService } from './mail.service';

const smtpTransportFactory: MailTransportFactory = (options) => nodemailer.createTransport(options);

@Module({
  providers: [
    MailService,
    { provide: MAIL_TRANSPORT_FACTORY, useValue: smtpTransportFactory },
  ],
  exports: [MailService],
})
export class MailModule { }
