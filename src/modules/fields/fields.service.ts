import { Injectable } from '@nestjs/common';
import type { Collection } from 'mongodb';
import { MongodbService } from '../mongodb/mongodb.service';
import {
  FIELDS_COLLECTION,
  type FieldChoice,
  type FieldDefinition,
  type FieldDefinitionProvider,
  type FieldDoc,
  type FieldDocBase,
  type FieldType,
  hasUniqueChoiceValues,
  isFieldChoice,
  isFieldKey,
  isFieldType,
} from '../../lib/fields/types';
import { StoreActionError } from '../../lib/errors/StoreActionError';
import { AppError } from '../../lib/errors/AppError';
import { summarize } from '../../lib/utils/strings';

/** Field types whose definitions carry a choice list. */
const CHOICE_TYPES: ReadonlySet<FieldType> = new Set<FieldType>([
  'select',
  'checkbox',
  'radio',
]);

export interface SaveFieldInput {
  readonly key: string;
  readonly label: string;
  readonly type: string;
  readonly choices?: ReadonlyArray<unknown>;
}

@Injectable()
export class FieldsService implements FieldDefinitionProvider {
  constructor(private readonly mongo: MongodbService) {}

  /* =========================
   *       Public API
   * ========================= */

  public async list(): Promise<ReadonlyArray<FieldDoc>> {
    try {
      const coll = await this.getCollection();
      return await coll.find({}).sort({ key: 1 }).toArray();
    } catch (err) {
      throw StoreActionError.wrap(err, {
        store: 'mongodb',
        operation: 'fields.list',
        target: FIELDS_COLLECTION,
      });
    }
  }

  /**
   * Definition for `key`, or `null` when the key is malformed or unknown.
   * Theme helpers treat both as "no choices".
   */
  public async getDefinition(key: string): Promise<FieldDefinition | null> {
    const doc = await this.getByKey(key);
    return doc ? toDefinition(doc) : null;
  }

  public async getByKey(key: string): Promise<FieldDoc | null> {
    if (!isFieldKey(key)) return null;
    try {
      const coll = await this.getCollection();
      return await coll.findOne({ key });
    } catch (err) {
      throw StoreActionError.wrap(err, {
        store: 'mongodb',
        operation: 'fields.getByKey',
        target: FIELDS_COLLECTION,
        argsPreview: { key },
      });
    }
  }

  /** Insert or replace the definition stored under `input.key`. */
  public async save(input: SaveFieldInput): Promise<FieldDoc> {
    const { key, label, type } = input;
    if (!isFieldKey(key)) {
      throw new AppError(`Invalid field key: ${key}`, 'FIELD_KEY_INVALID');
    }
    if (!isFieldType(type)) {
      throw new AppError(
        `Invalid field type: ${String(summarize(type))}`,
        'FIELD_TYPE_INVALID',
      );
    }
    const choices = validateChoices(type, input.choices);
    const now = new Date();

    try {
      const coll = await this.getCollection();
      const existing = await coll.findOne({ key });

      if (!existing) {
        const doc: FieldDocBase = {
          key,
          label,
          type,
          ...(choices ? { choices } : {}),
          createdAt: now,
          updatedAt: now,
        };
        const res = await coll.insertOne(doc);
        return { _id: res.insertedId, ...doc };
      }

      const next: FieldDocBase = {
        key,
        label,
        type,
        ...(choices ? { choices } : {}),
        createdAt: existing.createdAt,
        updatedAt: now,
      };
      await coll.replaceOne({ _id: existing._id }, next);
      return { _id: existing._id, ...next };
    } catch (err) {
      throw StoreActionError.wrap(err, {
        store: 'mongodb',
        operation: 'fields.save',
        target: FIELDS_COLLECTION,
        argsPreview: { key, type, choices: summarize(input.choices) },
      });
    }
  }

  public async deleteByKey(key: string): Promise<{ deleted: boolean }> {
    if (!isFieldKey(key)) {
      throw new AppError(`Invalid field key: ${key}`, 'FIELD_KEY_INVALID');
    }
    try {
      const coll = await this.getCollection();
      const res = await coll.deleteOne({ key });
      return { deleted: (res.deletedCount ?? 0) > 0 };
    } catch (err) {
      throw StoreActionError.wrap(err, {
        store: 'mongodb',
        operation: 'fields.deleteByKey',
        target: FIELDS_COLLECTION,
        argsPreview: { key },
      });
    }
  }

  /* =========================
   *         internals
   * ========================= */

  private async getCollection(): Promise<Collection<FieldDocBase>> {
    return this.mongo.getCollection<FieldDocBase>(FIELDS_COLLECTION);
  }
}

function toDefinition(doc: FieldDoc): FieldDefinition {
  return {
    key: doc.key,
    label: doc.label,
    type: doc.type,
    ...(doc.choices ? { choices: doc.choices.map((c) => ({ ...c })) } : {}),
  };
}

function validateChoices(
  type: FieldType,
  raw: ReadonlyArray<unknown> | undefined,
): ReadonlyArray<FieldChoice> | undefined {
  if (raw === undefined) return undefined;
  if (!CHOICE_TYPES.has(type)) {
    throw new AppError(
      `Field type "${type}" does not take choices`,
      'FIELD_CHOICES_UNSUPPORTED',
    );
  }
  const choices: FieldChoice[] = [];
  for (const c of raw) {
    if (!isFieldChoice(c)) {
      throw new AppError(
        'Each choice needs a string value and label',
        'FIELD_CHOICES_INVALID',
      );
    }
    choices.push({ value: c.value, label: c.label });
  }
  if (!hasUniqueChoiceValues(choices)) {
    throw new AppError('Choice values must be unique', 'FIELD_CHOICES_INVALID');
  }
  return choices;
}
