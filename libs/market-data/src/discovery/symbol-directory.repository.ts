import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import mongoose, { Connection, Model } from 'mongoose';
import { errorMessage } from '@libs/core';
import { SymbolDirectoryRepository, SymbolListQuery, UpsertOptions } from '../interfaces';
import { ASSET_CLASSES, AssetClass, InstrumentMapping, InstrumentMappingInput, isAssetClass } from '../models';

const instrumentMappingSchema = new mongoose.Schema<InstrumentMapping>(
  {
    symbol: { type: String, required: true, unique: true, uppercase: true, trim: true },
    epic: { type: String, required: true, index: true },
    displayName: { type: String, required: true },
    assetClass: { type: String, required: true, enum: [...ASSET_CLASSES], index: true },
    active: { type: Boolean, required: true, default: true, index: true },
    discoveredAt: { type: Date, required: true },
    lastUpdated: { type: Date, required: true },
  },
  { versionKey: false },
);

const toMapping = (doc: InstrumentMapping): InstrumentMapping => ({
  symbol: doc.symbol,
  epic: doc.epic,
  displayName: doc.displayName,
  assetClass: doc.assetClass,
  active: doc.active,
  discoveredAt: doc.discoveredAt,
  lastUpdated: doc.lastUpdated,
});

/** Symbol directory kept in MongoDB; `symbol` carries a unique index. */
@Injectable()
export class MongoSymbolDirectoryRepository implements SymbolDirectoryRepository, OnModuleDestroy {
  private readonly logger = new Logger(MongoSymbolDirectoryRepository.name);
  private readonly connection: Connection;
  private readonly model: Model<InstrumentMapping>;

  constructor(configService: ConfigService) {
    const uri = configService.get<string>('MONGODB_URI', 'mongodb://localhost:27017/market_data');
    const collection = configService.get<string>('SYMBOL_DIRECTORY_COLLECTION', 'symbol_directory');
    this.connection = mongoose.createConnection(uri, { serverSelectionTimeoutMS: 5000 });
    this.connection.on('error', (error: Error) => {
      this.logger.error(JSON.stringify({ event: 'directory_connection_error', message: error.message }));
    });
    this.model = this.connection.model<InstrumentMapping>('InstrumentMapping', instrumentMappingSchema, collection);
  }

  async findBySymbol(symbol: string): Promise<InstrumentMapping | null> {
    const doc = await this.model.findOne({ symbol: symbol.toUpperCase() }).lean<InstrumentMapping>().exec();
    return doc ? toMapping(doc) : null;
  }

  async findByEpic(epic: string): Promise<InstrumentMapping | null> {
    const doc = await this.model.findOne({ epic, active: true }).lean<InstrumentMapping>().exec();
    return doc ? toMapping(doc) : null;
  }

  async upsert(input: InstrumentMappingInput, options: UpsertOptions = {}): Promise<InstrumentMapping> {
    const now = new Date();
    const symbol = input.symbol.toUpperCase();
    const fields = {
      epic: input.epic,
      displayName: input.displayName,
      assetClass: input.assetClass,
      lastUpdated: now,
    };
    const update = options.reactivate
      ? { $set: { ...fields, active: true }, $setOnInsert: { symbol, discoveredAt: now } }
      : { $set: fields, $setOnInsert: { symbol, discoveredAt: now, active: true } };
    const doc = await this.model
      .findOneAndUpdate({ symbol }, update, { upsert: true, new: true })
      .lean<InstrumentMapping>()
      .exec();
    if (!doc) {
      throw new Error(`Upsert returned no document for ${symbol}`);
    }
    return toMapping(doc);
  }

  async deactivate(symbol: string): Promise<boolean> {
    const result = await this.model
      .updateOne({ symbol: symbol.toUpperCase() }, { $set: { active: false, lastUpdated: new Date() } })
      .exec();
    return result.matchedCount > 0;
  }

  async list(query: SymbolListQuery): Promise<InstrumentMapping[]> {
    const filter: { assetClass?: AssetClass; active?: boolean } = {};
    if (query.assetClass) filter.assetClass = query.assetClass;
    if (query.activeOnly ?? true) filter.active = true;
    const docs = await this.model
      .find(filter)
      .sort({ symbol: 1 })
      .skip(query.offset ?? 0)
      .limit(query.limit ?? 100)
      .lean<InstrumentMapping[]>()
      .exec();
    return docs.map(toMapping);
  }

  async countByAssetClass(): Promise<Partial<Record<AssetClass, number>>> {
    const rows = await this.model
      .aggregate<{ _id: string; count: number }>([
        { $match: { active: true } },
        { $group: { _id: '$assetClass', count: { $sum: 1 } } },
      ])
      .exec();
    const summary: Partial<Record<AssetClass, number>> = {};
    for (const row of rows) {
      if (isAssetClass(row._id)) {
        summary[row._id] = row.count;
      }
    }
    return summary;
  }

  async ping(): Promise<boolean> {
    try {
      await this.connection.asPromise();
      return this.connection.readyState === mongoose.ConnectionStates.connected;
    } catch (error) {
      this.logger.warn(JSON.stringify({ event: 'directory_ping_failed', message: errorMessage(error) }));
      return false;
    }
  }

  async onModuleDestroy(): Promise<void> {
    await this.connection.close();
  }
}
