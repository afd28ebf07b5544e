import { DefaultNamingStrategy, NamingStrategyInterface } from 'typeorm';
import { snakeCase } from 'typeorm/util/StringUtils';
import pluralize from 'pluralize';

export class CustomNamingStrategy extends DefaultNamingStrategy implements NamingStrategyInterface {
  // Pluralize and snake_case entity names that don't declare a table name
  tableName(targetName: string, userSpecifiedName: string | undefined): string {
    return snakeCase(userSpecifiedName || pluralize(targetName));
  }

  columnName(propertyName: string, customName: string | undefined, embeddedPrefixes: string[]): string {
    const baseName = customName || propertyName;
    return snakeCase(embeddedPrefixes.concat(baseName).join('_'));
  }

  joinColumnName(relationName: string, referencedColumnName: string): string {
    return snakeCase(`${relationName}_${referencedColumnName}`);
  }
}
