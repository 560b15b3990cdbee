/**
 * Config command - Show configuration file location
 */

import { getDefaultConfigPath, getUserConfigPath } from "../../utils";

export function configCommand(): void {
  const configPath = getUserConfigPath();
  console.log("User configuration file location:");
  console.log(configPath);
  console.log("\nCreate this file to customize the mapping and defaults.");
  console.log(`See ${getDefaultConfigPath()} for the bundled mapping.`);
}
