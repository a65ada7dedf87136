import { ExceptionFilter, Catch, ArgumentsHost, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import { I18nService, type TranslationVars } from '../i18n/i18n.service';

interface KeyedMessage {
    key: string;
    vars?: TranslationVars;
}

const isKeyedMessage = (value: unknown): value is KeyedMessage =>
    typeof value === 'object' &&
    value !== null &&
    'key' in value &&
    typeof value.key === 'string';

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
    private readonly logger = new Logger(HttpExceptionFilter.name);

    constructor(private readonly i18n: I18nService) { }

    catch(exception: unknown, host: ArgumentsHost) {
        const ctx = host.switchToHttp();
        const response = ctx.getResponse<Response>();
        const request = ctx.getRequest<Request>();

        let status = HttpStatus.INTERNAL_SERVER_ERROR;
        let message: KeyedMessage | string | string[] = 'Internal server error';

        if (exception instanceof HttpException) {
            status = exception.getStatus();
            const res = exception.getResponse();

            if (typeof res === 'string') {
                message = res;
            } else if (isKeyedMessage(res)) {
                // Structured bodies: { key: 'translation.key', vars: {...} }
                message = { key: res.key, vars: res.vars };
            } else if ('message' in res && (typeof res.message === 'string' || Array.isArray(res.message))) {
                // ValidationPipe reports a list of constraint messages
                message = res.message;
            }
        } else if (exception instanceof Error) {
            this.logger.error(`Unhandled error on ${request.method} ${request.url}`, exception.stack);
        }

        // Locale from Accept-Language, defaulting to 'en'
        const accept = request.headers['accept-language'] || 'en';
        const locale = accept.split(',')[0].split('-')[0].trim() || 'en';

        let translated: string | string[] = Array.isArray(message) ? message : '';
        if (isKeyedMessage(message)) {
            translated = this.i18n.t(message.key, locale, message.vars);
        } else if (typeof message === 'string') {
            translated = message.includes(' ') ? message : this.i18n.t(message, locale);
        }

        response.status(status).json({
            success: false,
            error: {
                statusCode: status,
                message: translated,
            },
        });
    }
}
