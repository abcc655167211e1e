import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Post,
  Query,
} from '@nestjs/common';
import { FieldsService } from './fields.service';
import { FieldDto, ListFieldsResponseDto } from './dto/ListFields.response.dto';
import { GetFieldRequestDto } from './dto/GetField.request.dto';
import { GetFieldResponseDto } from './dto/GetField.response.dto';
import {
  SaveFieldRequestDto,
  SaveFieldResponseDto,
} from './dto/SaveField.request.dto';
import {
  DeleteFieldRequestDto,
  DeleteFieldResponseDto,
} from './dto/DeleteField.request.dto';
import type { FieldDoc } from '../../lib/fields/types';
import { AppError } from '../../lib/errors/AppError';
import { StoreActionError } from '../../lib/errors/StoreActionError';

@Controller('fields')
export class FieldsController {
  constructor(private readonly fields: FieldsService) {}

  /** GET /api/fields/list */
  @Get('list')
  public async list(): Promise<ListFieldsResponseDto> {
    const docs = await this.fields.list();
    return { fields: docs.map(toFieldDto) };
  }

  /** GET /api/fields/get?key=... */
  @Get('get')
  public async get(
    @Query() query: GetFieldRequestDto,
  ): Promise<GetFieldResponseDto> {
    const doc = await this.fields.getByKey(query.key);
    return { field: doc ? toFieldDto(doc) : null };
  }

  /** POST /api/fields/save */
  @Post('save')
  public async save(
    @Body() body: SaveFieldRequestDto,
  ): Promise<SaveFieldResponseDto> {
    try {
      const saved = await this.fields.save({
        key: body.key,
        label: body.label,
        type: body.type,
        choices: body.choices,
      });
      return { field: toFieldDto(saved) };
    } catch (e) {
      throw asBadRequest(e);
    }
  }

  /** POST /api/fields/delete */
  @Post('delete')
  public async delete(
    @Body() body: DeleteFieldRequestDto,
  ): Promise<DeleteFieldResponseDto> {
    try {
      return await this.fields.deleteByKey(body.key);
    } catch (e) {
      throw asBadRequest(e);
    }
  }
}

/** Validation failures become 400s; store failures and the rest pass through. */
function asBadRequest(e: unknown): unknown {
  if (e instanceof AppError && !(e instanceof StoreActionError)) {
    return new BadRequestException(e.message);
  }
  return e;
}

/* ---------------------------
   Mapping helpers
   --------------------------- */
function toFieldDto(doc: FieldDoc): FieldDto {
  return {
    id: doc._id.toHexString(),
    key: doc.key,
    label: doc.label,
    type: doc.type,
    choices: doc.choices?.map((c) => ({ value: c.value, label: c.label })),
    createdAt: doc.createdAt.toISOString(),
    updatedAt: doc.updatedAt.toISOString(),
  };
}
