import { describe, expect, it } from "vitest";
import { ScriptedProvider } from "../testing/scripted-provider.js";
import { FormatError, StageErrorType, TransportError } from "../types/errors.js";
import type { RecipeOptions } from "../types/recipe.js";
import { SousChef } from "./chef.js";

const options: RecipeOptions = {
  scale: 1,
  servings: 4,
  units: "metric",
  restrictions: [],
};

const pancakeReply = JSON.stringify({
  title: "Pancakes",
  servings: 4,
  ingredients: [
    { name: "flour", quantity: 200, unit: "grams" },
    { name: "milk", quantity: "1 1/2", unit: "cups" },
    { name: "egg", quantity: 2, unit: null },
    { name: "salt", quantity: "to taste", unit: null },
  ],
  steps: ["Whisk everything", "Fry ladlefuls in a hot pan"],
  prep_time: "10 min",
  cook_time: 15,
  substitutions: { milk: "oat milk", egg: ["flax egg", "banana"] },
});

describe("SousChef.normalizeIngredients", () => {
  it("returns the cleaned list", async () => {
    const provider = new ScriptedProvider([
      '```json\n{"normalized_ingredients": ["egg", "flour", "milk"]}\n```',
    ]);
    const chef = new SousChef(provider);

    await expect(chef.normalizeIngredients("egg, flour, milk")).resolves.toEqual([
      "egg",
      "flour",
      "milk",
    ]);
    expect(provider.prompts[0]).toContain("Ingredients: egg, flour, milk");
  });

  it("deduplicates case-insensitively", async () => {
    const chef = new SousChef(
      new ScriptedProvider(['{"normalized_ingredients": ["Egg", "egg", " Milk"]}'])
    );
    await expect(chef.normalizeIngredients("eggs, Egg, milk")).resolves.toEqual([
      "egg",
      "milk",
    ]);
  });

  it("accepts a bare array", async () => {
    const chef = new SousChef(new ScriptedProvider(['["tomato", "basil"]']));
    await expect(chef.normalizeIngredients("tomatos, basil")).resolves.toEqual([
      "tomato",
      "basil",
    ]);
  });

  it("fails with a FormatError instead of returning an empty list", async () => {
    const chef = new SousChef(
      new ScriptedProvider(['{"normalized_ingredients": []}'])
    );
    const error = await chef.normalizeIngredients("egg").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(FormatError);
    expect((error as FormatError).raw).toBe('{"normalized_ingredients": []}');
  });

  it("keeps the raw reply when it cannot be parsed", async () => {
    const chef = new SousChef(new ScriptedProvider(["I love eggs!"]));
    const error = await chef.normalizeIngredients("egg").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(FormatError);
    expect((error as FormatError).raw).toBe("I love eggs!");
    expect((error as FormatError).type).toBe(StageErrorType.FORMAT);
  });

  it("passes TransportErrors through", async () => {
    const chef = new SousChef(
      new ScriptedProvider([new TransportError("Claude request failed: 401")])
    );
    await expect(chef.normalizeIngredients("egg")).rejects.toThrow(
      "Claude request failed: 401"
    );
  });

  it("wraps other provider failures as TransportErrors", async () => {
    const chef = new SousChef(new ScriptedProvider([new Error("ECONNREFUSED")]));
    const error = await chef.normalizeIngredients("egg").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TransportError);
    expect((error as TransportError).message).toBe(
      "AI request failed: ECONNREFUSED"
    );
  });

  it("rejects blank input without calling the service", async () => {
    const provider = new ScriptedProvider();
    const chef = new SousChef(provider);
    await expect(chef.normalizeIngredients(" , \n")).rejects.toThrow(
      "Please enter some ingredients"
    );
    expect(provider.prompts).toHaveLength(0);
  });
});

describe("SousChef.suggestDishes", () => {
  it("keeps response order and descriptions", async () => {
    const provider = new ScriptedProvider([
      JSON.stringify({
        dishes: [
          { name: "Pancakes", description: "Fluffy and quick." },
          { name: "Crepes", description: "" },
        ],
      }),
    ]);
    const chef = new SousChef(provider);

    await expect(
      chef.suggestDishes(["egg", "flour", "milk"], 3)
    ).resolves.toEqual([
      { name: "Pancakes", description: "Fluffy and quick." },
      { name: "Crepes" },
    ]);
    expect(provider.prompts[0]).toContain("Suggest up to 3 dish ideas");
  });

  it("truncates to the requested maximum", async () => {
    const chef = new SousChef(
      new ScriptedProvider(['{"dishes": ["A", "B", "C", "D"]}'])
    );
    const dishes = await chef.suggestDishes(["egg"], 2);
    expect(dishes).toEqual([{ name: "A" }, { name: "B" }]);
  });

  it("treats an empty list as a valid result", async () => {
    const chef = new SousChef(new ScriptedProvider(['{"dishes": []}']));
    await expect(chef.suggestDishes(["egg"])).resolves.toEqual([]);
  });

  it("reads a list of dishes wrapped in prose", async () => {
    const chef = new SousChef(
      new ScriptedProvider([
        'Here you go: [{"name": "Pancakes", "description": "Quick."}]',
      ])
    );
    await expect(chef.suggestDishes(["egg"])).resolves.toEqual([
      { name: "Pancakes", description: "Quick." },
    ]);
  });

  it("drops entries without a name", async () => {
    const chef = new SousChef(
      new ScriptedProvider(['[{"name": "  "}, {"name": " Omelette "}]'])
    );
    await expect(chef.suggestDishes(["egg"])).resolves.toEqual([
      { name: "Omelette" },
    ]);
  });

  it("raises a FormatError for unexpected structure", async () => {
    const chef = new SousChef(
      new ScriptedProvider(['{"ideas": [{"title": "Pancakes"}]}'])
    );
    const error = await chef.suggestDishes(["egg"]).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(FormatError);
    expect((error as FormatError).raw).toBe('{"ideas": [{"title": "Pancakes"}]}');
  });

  it("rejects an empty ingredient list and a bad maximum", async () => {
    const chef = new SousChef(new ScriptedProvider());
    await expect(chef.suggestDishes([])).rejects.toThrow(
      "At least one ingredient is required"
    );
    await expect(chef.suggestDishes(["egg"], 0)).rejects.toThrow(RangeError);
  });
});

describe("SousChef.generateRecipe", () => {
  const dish = { name: "Pancakes", description: "Fluffy and quick." };
  const ingredients = ["egg", "flour", "milk"];

  it("builds a structured recipe from the reply", async () => {
    const chef = new SousChef(new ScriptedProvider([pancakeReply]));
    const generated = await chef.generateRecipe(dish, ingredients, options);

    expect(generated).toEqual({
      format: "structured",
      recipe: {
        title: "Pancakes",
        servings: 4,
        ingredients: [
          { name: "flour", quantity: 200, unit: "g" },
          { name: "milk", quantity: 1.5, unit: "cup" },
          { name: "egg", quantity: 2, unit: null },
          { name: "salt", quantity: null, unit: "to taste" },
        ],
        steps: ["Whisk everything", "Fry ladlefuls in a hot pan"],
        substitutions: { milk: ["oat milk"], egg: ["flax egg", "banana"] },
        prepTime: "10 min",
        cookTime: "15 min",
        scale: 1,
      },
    });
  });

  it("doubles quantities at scale 2 compared with scale 1", async () => {
    const chef = new SousChef(new ScriptedProvider([pancakeReply, pancakeReply]));
    const base = await chef.generateRecipe(dish, ingredients, options);
    const doubled = await chef.generateRecipe(dish, ingredients, {
      ...options,
      scale: 2,
    });

    if (base.format !== "structured" || doubled.format !== "structured") {
      throw new Error("expected structured recipes");
    }
    expect(doubled.recipe.scale).toBe(2);
    doubled.recipe.ingredients.forEach((ingredient, i) => {
      const baseline = base.recipe.ingredients[i].quantity;
      expect(ingredient.quantity).toBe(baseline === null ? null : baseline * 2);
    });
  });

  it("puts servings, units and restrictions in the prompt", async () => {
    const provider = new ScriptedProvider([pancakeReply]);
    const chef = new SousChef(provider);
    await chef.generateRecipe(dish, ingredients, {
      scale: 3,
      servings: 2,
      units: "imperial",
      restrictions: ["vegan", "nut-free"],
    });

    expect(provider.prompts[0]).toContain("for 2 servings using imperial units");
    expect(provider.prompts[0]).toContain(
      "dietary restrictions: vegan, nut-free."
    );
  });

  it("parses ingredient lines and an instructions key", async () => {
    const chef = new SousChef(
      new ScriptedProvider([
        JSON.stringify({
          name: "Omelette",
          ingredients: ["3 eggs", "1 tbsp butter"],
          instructions: [{ text: "Beat the eggs" }, "Cook gently"],
        }),
      ])
    );
    const generated = await chef.generateRecipe({ name: "Omelette" }, ["egg"], {
      ...options,
      servings: 1,
    });

    expect(generated).toEqual({
      format: "structured",
      recipe: {
        title: "Omelette",
        servings: 1,
        ingredients: [
          { name: "eggs", quantity: 3, unit: null },
          { name: "butter", quantity: 1, unit: "tbsp" },
        ],
        steps: ["Beat the eggs", "Cook gently"],
        substitutions: {},
        prepTime: null,
        cookTime: null,
        scale: 1,
      },
    });
  });

  it("falls back to text when the reply is not a recipe", async () => {
    const reply = "Mix flour, eggs and milk, then fry.\nServe warm.";
    const chef = new SousChef(new ScriptedProvider([reply]));

    await expect(chef.generateRecipe(dish, ingredients, options)).resolves.toEqual({
      format: "text",
      title: "Pancakes",
      text: reply,
    });
  });

  it("raises a FormatError for an empty reply", async () => {
    const chef = new SousChef(new ScriptedProvider(["   "]));
    await expect(
      chef.generateRecipe(dish, ingredients, options)
    ).rejects.toBeInstanceOf(FormatError);
  });

  it("turns a failed request into a TransportError", async () => {
    const chef = new SousChef(
      new ScriptedProvider([new Error("socket hang up")])
    );
    const error = await chef
      .generateRecipe(dish, ingredients, options)
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TransportError);
    expect((error as TransportError).message).toBe(
      "AI request failed: socket hang up"
    );
  });

  it("rejects a non-positive scale before calling the service", async () => {
    const provider = new ScriptedProvider();
    const chef = new SousChef(provider);
    await expect(
      chef.generateRecipe(dish, ingredients, { ...options, scale: 0 })
    ).rejects.toThrow(RangeError);
    expect(provider.prompts).toHaveLength(0);
  });
});
