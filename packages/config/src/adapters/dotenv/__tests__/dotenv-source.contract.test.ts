import fs from "node:fs/promises"
import path from "node:path"
import { describeEnvironmentSourceContract } from "../../../ports/__tests__/environment-source.contract"
import { DotenvSource } from "../dotenv-source"

describeEnvironmentSourceContract({
  name: "DotenvSource",
  make: async (dir, hubUrl) => {
    await fs.writeFile(path.join(dir, "hostmon.env"), `# hub access\nHOSTMON_HUB_URL=${hubUrl}\nHOSTMON_HUB_USER=agent\n`)
    return new DotenvSource({ file: "hostmon.env", required: true, cwd: dir })
  },
})
