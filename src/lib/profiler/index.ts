/**
 * Profiler module - runs dialect detection, frequency scans and field
 * statistics over a file and assembles the per-field profiles
 */

import {
  DialectInfo,
  FieldProfile,
  ValueType,
} from "../../types/data-model.js";
import {
  DEFAULT_PROFILER_CONFIG,
  ProfilerConfig,
} from "../../types/config.js";
import { ValidationError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { countMatching, topFrequencies } from "../../utils/frequency-map.js";
import {
  createValueClassifier,
  inferFieldType,
  ValueClassifier,
} from "../classifier/index.js";
import {
  getCase,
  getMax,
  getMaxLength,
  getMin,
  getMinLength,
} from "../field-stats/index.js";
import { getFieldFreq, getFieldNames } from "../scanner/index.js";
import { DialectDetector } from "../dialect/index.js";
import { ProfilerResult } from "./types.js";

export * from "./types.js";

/**
 * Main profiler class
 */
export class Profiler {
  private readonly config: ProfilerConfig;
  private readonly classifier: ValueClassifier;

  constructor(
    config: Partial<ProfilerConfig> = {},
    classifier?: ValueClassifier,
  ) {
    this.config = { ...DEFAULT_PROFILER_CONFIG, ...config };
    this.classifier =
      classifier ??
      createValueClassifier({ unknownMarkers: this.config.unknownMarkers });
  }

  /**
   * Detect the file's dialect, honouring configured delimiter/header/quote hints
   */
  analyzeDialect(filePath: string): Promise<DialectInfo> {
    const detector = new DialectDetector(
      filePath,
      {
        delimiter: this.config.delimiter,
        quoteChar: this.config.quoteChar,
        hasHeader: this.config.hasHeader,
      },
      { sampleSize: this.config.sampleSize, classifier: this.classifier },
    );
    return detector.analyze();
  }

  /**
   * Profile one field in its own pass over the file
   */
  async profileField(
    filePath: string,
    fieldNumber: number,
    dialect: DialectInfo,
  ): Promise<FieldProfile> {
    const { delimiter, hasHeader, quoteChar } = dialect;

    const name =
      (await getFieldNames(filePath, fieldNumber, hasHeader, delimiter, {
        quoteChar,
      })) ?? `field_num_${fieldNumber}`;

    const { frequencies, truncated } = await getFieldFreq(
      filePath,
      fieldNumber,
      hasHeader,
      delimiter,
      { maxFreqSize: this.config.maxFreqSize, quoteChar },
    );

    const valueType: ValueType =
      this.config.declaredTypes?.[fieldNumber] ??
      inferFieldType(frequencies, this.classifier);

    const profile: FieldProfile = {
      fieldNumber,
      name,
      valueType,
      case: getCase(valueType, frequencies, this.classifier),
      min: getMin(valueType, frequencies, this.classifier),
      max: getMax(valueType, frequencies, this.classifier),
      minLength: getMinLength(frequencies, this.classifier),
      maxLength: getMaxLength(frequencies, this.classifier),
      uniqueCount: frequencies.size,
      unknownCount: countMatching(frequencies, (value) =>
        this.classifier.isUnknown(value),
      ),
      truncated,
      topValues: topFrequencies(frequencies, this.config.topValues),
    };

    logger.debug("Field profiled", {
      fieldNumber,
      name,
      valueType,
      uniqueCount: profile.uniqueCount,
      truncated,
    });

    return profile;
  }

  /**
   * Profile the configured fields (all fields by default) of a file
   */
  async profileFile(filePath: string): Promise<ProfilerResult> {
    const dialect = await this.analyzeDialect(filePath);
    const fieldNumbers =
      this.config.fields ??
      Array.from({ length: dialect.fieldCount }, (_, index) => index);

    for (const fieldNumber of fieldNumbers) {
      if (fieldNumber >= dialect.fieldCount) {
        throw new ValidationError(
          `Field number ${fieldNumber} is out of range for ${dialect.fieldCount} fields`,
          { filePath },
        );
      }
    }

    logger.info("Profiling fields", {
      filePath,
      fields: fieldNumbers.length,
      formatType: dialect.formatType,
    });

    const fields: FieldProfile[] = [];
    for (const fieldNumber of fieldNumbers) {
      fields.push(await this.profileField(filePath, fieldNumber, dialect));
    }

    const metadata = {
      recordsAnalyzed: dialect.recordCount,
      fieldsProfiled: fields.length,
      truncatedFields: fields.filter((field) => field.truncated).length,
    };

    logger.info("Profiling complete", { ...metadata });

    return { profile: { filePath, dialect, fields }, metadata };
  }
}

/**
 * Profile every configured field of a file
 */
export function profileFile(
  filePath: string,
  config: Partial<ProfilerConfig> = {},
): Promise<ProfilerResult> {
  return new Profiler(config).profileFile(filePath);
}
