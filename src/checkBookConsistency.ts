import fs from "fs";
import {
  compareBookSets,
  extractAbbreviations,
  extractDirectoryNames,
} from "./bookConsistency";

function fail(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}

function readFileOrFail(filePath: string): string {
  if (!fs.existsSync(filePath)) {
    fail(`The file '${filePath}' was not found.`);
  }
  return fs.readFileSync(filePath, "utf-8");
}

/**
 * Compares the book abbreviations of a chapter list with the
 * directory names of a book JSON file
 */
function checkBookConsistency(): void {
  const [txtFile, jsonFile] = process.argv.slice(2);
  if (!txtFile || !jsonFile) {
    console.log("Usage: check-books <txtFile> <jsonFile>");
    process.exit(1);
  }

  console.log(`--- Checking consistency between '${txtFile}' and '${jsonFile}' ---`);

  const txtAbbreviations = extractAbbreviations(readFileOrFail(txtFile));

  let data: unknown;
  try {
    data = JSON.parse(readFileOrFail(jsonFile));
  } catch {
    fail(`The file '${jsonFile}' is not a valid JSON file.`);
  }

  let jsonDirectories: Set<string>;
  try {
    jsonDirectories = extractDirectoryNames(data);
  } catch (error) {
    fail(
      `The JSON in '${jsonFile}' does not have the expected structure (${
        error instanceof Error ? error.message : String(error)
      }).`
    );
  }

  const { inJsonNotTxt, inTxtNotJson } = compareBookSets(
    txtAbbreviations,
    jsonDirectories
  );

  console.log("-".repeat(30));
  if (inJsonNotTxt.length === 0 && inTxtNotJson.length === 0) {
    console.log("✅ Success: All abbreviations and directory names are consistent.");
  } else {
    if (inJsonNotTxt.length > 0) {
      console.log("❌ Found 'directory_name' entries in JSON that are missing from the TXT file:");
      inJsonNotTxt.forEach((name) => console.log(`  - ${name}`));
    }
    if (inTxtNotJson.length > 0) {
      console.log("\n❌ Found abbreviations in the TXT file that are missing from the JSON file:");
      inTxtNotJson.forEach((name) => console.log(`  - ${name}`));
    }
  }
  console.log("-".repeat(30));
}

checkBookConsistency();
