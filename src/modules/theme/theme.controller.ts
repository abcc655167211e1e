import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  Post,
  Query,
} from '@nestjs/common';
import { ThemeService } from './theme.service';
import {
  SegmentsRequestDto,
  type SegmentsResponseDto,
} from './dto/Segments.request.dto';
import {
  FieldOptionsRequestDto,
  FieldOptionsResponseDto,
} from './dto/FieldOptions.request.dto';
import {
  QueryUsersRequestDto,
  QueryUsersResponseDto,
} from './dto/QueryUsers.request.dto';
import {
  RenderContentRequestDto,
  RenderContentResponseDto,
} from './dto/RenderContent.request.dto';

@Controller('theme')
export class ThemeController {
  constructor(private readonly theme: ThemeService) {}

  /** GET /api/theme/segments[?index=n] — segments of this request's own path */
  @Get('segments')
  public segments(@Query() query: SegmentsRequestDto): SegmentsResponseDto {
    if (query.index === undefined) {
      return { segments: this.theme.segments() };
    }
    return { index: query.index, segment: this.theme.segments(query.index) };
  }

  /** GET /api/theme/options?field=...&current=... */
  @Get('options')
  public async options(
    @Query() query: FieldOptionsRequestDto,
  ): Promise<FieldOptionsResponseDto> {
    const html = await this.theme.renderFieldOptions(
      query.field,
      query.current,
    );
    return { html, wrapper: this.theme.useWrapper() };
  }

  /** POST /api/theme/users/query */
  @Post('users/query')
  @HttpCode(200)
  public async queryUsers(
    @Body() body: QueryUsersRequestDto,
  ): Promise<QueryUsersResponseDto> {
    const users = await this.theme.queryUsers(body);
    if (users === null) {
      throw new BadRequestException({
        ok: false,
        error: {
          code: 'InvalidOperator',
          message: `Unsupported comparison operator: ${body.compare}`,
        },
      });
    }
    return { users };
  }

  /** POST /api/theme/content */
  @Post('content')
  @HttpCode(200)
  public content(@Body() body: RenderContentRequestDto): RenderContentResponseDto {
    return { text: this.theme.renderContent(body.type, body.text) };
  }
}
